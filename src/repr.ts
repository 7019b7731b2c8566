// repr(m :Module, w :Writer, options? :Partial<Options>) :void
// Represents a decoded module visually as plain text (with optional terminal
// colors.)
//
import type {
  Module, Section, Instr, Expr, BlockType, FuncType, Limits, TableType, GlobalType,
  Import, Export, ElemSegment, DataSegment, FunctionBody,
} from './ast'
import { fmtBlockType, fmtimm, opname } from './lbtext'

export type Writer = (s :string)=>void

export interface Options {
  readonly colors         :boolean  // explicitly enable or disable terminal colors
  readonly immSeparator   :string   // separates an instruction from its immediates; defaults to ` `
  readonly detailedTypes? :boolean  // `u32(9)` or just `9`
}

interface Ctx {
  readonly write       :(depth :number, s :string)=>void
  readonly writeln     :(depth :number, s :string)=>void
  readonly writeinline :(s :string)=>void
  readonly style       :(s :string, style :string)=>string
  readonly options     :Options
}

const defaultOptions :Options = {
  colors:       true,
  immSeparator: ' ',
}

const ansi = (str :string, style :string) => '\x1B[' + style + 'm' + str + '\x1B[0m'

const reprop = (op :string, c :Ctx) => c.style(op, '96')
const styleType = (s :string, c :Ctx) => c.style(s, '33')

function hexbytes(b :ArrayLike<number>, max :number) :string {
  const v :string[] = []
  for (let i = 0, L = b.length; i != L; ++i) {
    if (v.length == max) { v.push('...') ;break }
    v.push((b[i] < 16 ? '0' : '') + b[i].toString(16))
  }
  return v.join(' ')
}

function visitValue(v :number, tname :string, c :Ctx, depth :number) {
  const s = String(v)
  return c.write(depth, c.options.detailedTypes ? `${tname}(${s})` : s)
}

//——————————————————————————————————————————————————————————————————————————————
// Instructions

function fmtBlockTypeImm(t :BlockType) :string {
  const s = fmtBlockType(t).trim()
  return s ? ' [' + s + ']' : ''
}

function visitInstrs(nodes :Instr[], c :Ctx, depth :number) {
  for (let n of nodes) {
    visitInstr(n, c, depth)
  }
}

function visitInstr(n :Instr, c :Ctx, depth :number) {
  if ('body' in n) {
    c.write(depth, '(' + reprop(n.op, c) + fmtBlockTypeImm(n.type))
    visitInstrs(n.body, c, depth + 1)
    return c.write(depth, ')')
  }
  if ('then_' in n) {
    c.write(depth, '(' + reprop('if', c) + fmtBlockTypeImm(n.type))
    c.write(depth + 1, '(then')
    visitInstrs(n.then_, c, depth + 2)
    c.write(depth + 1, ')')
    if ('else_' in n) {
      c.write(depth + 1, '(else')
      visitInstrs(n.else_, c, depth + 2)
      c.write(depth + 1, ')')
    }
    return c.write(depth, ')')
  }
  const imm = fmtimm(n).trim()
  if (imm == '') {
    return c.write(depth, reprop(opname(n), c))
  }
  c.write(depth, '(' + reprop(opname(n), c) + c.options.immSeparator + '[' + imm + '])')
}

function visitExpr(name :string, e :Expr, c :Ctx, depth :number) {
  c.write(depth, '(' + name)
  visitInstrs(e, c, depth + 1)
  c.write(depth, ')')
}

//——————————————————————————————————————————————————————————————————————————————
// Types

const fmtLimits = (l :Limits) => l.min + '..' + (l.max !== undefined ? l.max : '')

function fmtFuncType(t :FuncType, c :Ctx) :string {
  const params = t.params.map(p => styleType(p, c)).join(' ')
  const results = t.results.map(r => styleType(r, c)).join(' ')
  return '(func (' + params + ')' + (results ? ' ' + results : '') + ')'
}

const fmtTableType = (t :TableType, c :Ctx) =>
  '(table ' + styleType(t.elem, c) + ' ' + fmtLimits(t.limits) + ')'

const fmtGlobalType = (t :GlobalType, c :Ctx) =>
  styleType(t.type, c) + (t.mutable ? ' mutable' : ' immutable')

function fmtImport(i :Import, c :Ctx) :string {
  const d = i.desc
  const desc =
    d.kind == 'func'   ? `(func ${d.type})` :
    d.kind == 'table'  ? fmtTableType(d.table, c) :
    d.kind == 'memory' ? `(memory ${fmtLimits(d.memory)})` :
                         `(global ${fmtGlobalType(d.global, c)})`
  return `(import "${i.module}" "${i.name}" ${desc})`
}

const fmtExport = (e :Export) => `(export "${e.name}" (${e.desc.kind} ${e.desc.index}))`

//——————————————————————————————————————————————————————————————————————————————
// Segments and bodies

function visitElemSegment(s :ElemSegment, c :Ctx, depth :number) {
  const mode = s.mode
  c.write(depth, '(elem ' + s.flags + ' ' + mode.kind +
    (mode.kind == 'active' ? ' table=' + mode.table : '') + ' ' + styleType(s.type, c))
  if (mode.kind == 'active') {
    visitExpr('offset', mode.offset, c, depth + 1)
  }
  const init = s.init
  if (init.kind == 'funcs') {
    for (let f of init.funcs) {
      visitValue(f, 'u32', c, depth + 1)
    }
  } else {
    for (let e of init.exprs) {
      visitExpr('item', e, c, depth + 1)
    }
  }
  c.write(depth, ')')
}

function visitDataSegment(s :DataSegment, c :Ctx, depth :number) {
  const mode = s.mode
  c.write(depth, '(data_segment ' + mode.kind + (mode.kind == 'active' ? ' memory=' + mode.memory : ''))
  if (mode.kind == 'active') {
    visitExpr('offset', mode.offset, c, depth + 1)
  }
  c.write(depth + 1, '(data ' + hexbytes(s.init, 8) + ')')
  c.write(depth, ')')
}

function visitFunctionBody(b :FunctionBody, c :Ctx, depth :number) {
  c.write(depth, '(function_body')
  for (let l of b.locals) {
    c.write(depth + 1, '(local ' + l.count + ' ' + styleType(l.type, c) + ')')
  }
  visitInstrs(b.code, c, depth + 1)
  c.write(depth, ')')
}

//——————————————————————————————————————————————————————————————————————————————
// Sections

function visitSection(s :Section, c :Ctx, depth :number) {
  c.write(depth, '(' + c.style(s.kind, '92'))
  const d = depth + 1
  switch (s.kind) {
    case 'custom': {
      c.write(d, '"' + s.name + '"')
      c.write(d, '(data ' + hexbytes(s.bytes, 8) + ')')
      break
    }
    case 'type': {
      s.types.forEach(t => c.write(d, fmtFuncType(t, c)))
      break
    }
    case 'import': {
      s.imports.forEach(i => c.write(d, fmtImport(i, c)))
      break
    }
    case 'function': {
      s.types.forEach(t => visitValue(t, 'u32', c, d))
      break
    }
    case 'table': {
      s.tables.forEach(t => c.write(d, fmtTableType(t, c)))
      break
    }
    case 'memory': {
      s.memories.forEach(m => c.write(d, '(memory ' + fmtLimits(m) + ')'))
      break
    }
    case 'global': {
      s.globals.forEach(g => visitExpr('global ' + fmtGlobalType(g.type, c), g.init, c, d))
      break
    }
    case 'export': {
      s.exports.forEach(e => c.write(d, fmtExport(e)))
      break
    }
    case 'start': {
      visitValue(s.func, 'u32', c, d)
      break
    }
    case 'element': {
      s.segments.forEach(e => visitElemSegment(e, c, d))
      break
    }
    case 'code': {
      s.bodies.forEach(b => visitFunctionBody(b, c, d))
      break
    }
    case 'data': {
      s.segments.forEach(e => visitDataSegment(e, c, d))
      break
    }
    case 'data_count': {
      visitValue(s.count, 'u32', c, d)
      break
    }
    case 'unknown': {
      visitValue(s.id, 'u8', c, d)
      c.write(d, '(data ' + hexbytes(s.bytes, 8) + ')')
      break
    }
  }
  c.write(depth, ')')
}

//——————————————————————————————————————————————————————————————————————————————

export function reprBuffer(
  buffer          :Uint8Array|ArrayBuffer,
  w               :Writer,
  limit?          :number,
  highlightRange? :readonly number[],
  options?        :Partial<Options>)
{
  const bytes = buffer instanceof Uint8Array ? buffer : new Uint8Array(buffer)
  const colors = !options || options.colors !== false
  limit = Math.min(bytes.length, limit || Infinity)

  let hl :[number, number]|null = null
  if (highlightRange && highlightRange.length > 0) {
    hl = [highlightRange[0], highlightRange[1] || highlightRange[0] + 1]
  }

  let s :string[] = [], i = 0
  const flush = (tail :string) => {
    const line = s.map((b, i) => (i > 0 && i % 4 == 0 ? ' ' : '') + b).join(' ')
    w((line && tail ? line + ' ' + tail : line + tail) + '\n')
    s = []
  }

  for (; i < limit; ++i) {
    const b = bytes[i]
    const str = (b < 16 ? '0' : '') + b.toString(16)
    const inHLRange = hl !== null && i < hl[1] && i >= hl[0]
    if (!colors) {
      s.push(inHLRange ? '[' + str + ']' : str)
    } else if (inHLRange) {
      s.push('\x1B[45;97m' + str + '\x1B[0m')
    } else if (b == 0) {
      s.push('\x1B[2m00\x1B[0m')
    } else {
      s.push(b < 16 ? '\x1B[2m0\x1B[0m' + str.substr(1) : str)
    }
    if (s.length == 16) {
      flush('')
    }
  }
  const tail = (hl !== null && hl[0] >= i) ? (colors ? '\x1B[45;97m..\x1B[0m' : '[..]') : ''
  if (s.length || tail) {
    flush(tail)
  }
}


export function repr(m :Module, w :Writer, options? :Partial<Options>) {
  const SP = '                                                      '

  let currLineLen = 0
  let lastCh = ''
  let writer = w

  const o :Partial<Options> = options || {}
  const opts :Options = {
    colors:        o.colors !== undefined ? o.colors : defaultOptions.colors,
    immSeparator:  o.immSeparator !== undefined ? o.immSeparator : defaultOptions.immSeparator,
    detailedTypes: o.detailedTypes,
  }

  if (opts.colors) {
    // writer that colors immediate brackets
    let immOpen = ansi('[', '2'),
        immClose = ansi(']', '2')
    writer = s => {
      w(s.replace(/([^\x1B]|^)[\[\]]/g, m =>
        m.length == 2 ?
          m[0] + (m[1] == '[' ? immOpen : immClose) :
          (m[0] == '[' ? immOpen : immClose)
      ))
    }
  }

  const ctx :Ctx = {

    options: opts,

    style(str :string, style :string) {
      return opts.colors ? ansi(str, style) : str
    },

    writeln(depth :number, chunk :string) {
      const line = SP.substr(0, depth * 2) + chunk
      currLineLen = line.length
      lastCh = chunk[chunk.length-1]
      writer('\n' + line)
    },

    writeinline(chunk :string) {
      currLineLen += chunk.length
      lastCh = chunk[chunk.length-1]
      writer(chunk)
    },

    write(depth :number, chunk :string) {
      if (currLineLen > 0 && depth > 0) {
        const ch0 = chunk[0]
        if (ch0 == '(') {
          return ctx.writeln(depth, chunk)
        }
        if (ch0 != ')' && ch0 != ']' &&
            lastCh != '[' && lastCh != '(')
        {
          currLineLen += 1
          chunk = ' ' + chunk
        }
      }
      ctx.writeinline(chunk)
    },
  }

  ctx.write(0, '(module ' + m.version)
  m.sections.forEach(s => visitSection(s, ctx, 1))
  ctx.write(0, ')')
}

// Simple Writer that buffers everything as a string that can be
// retrieved with toString()
export function BufferedWriter() :Writer {
  const buf :string[] = []
  const w = (s :string) => { buf.push(s) }
  w.toString = () => buf.join('')
  return w
}

// Convenience functions that returns strings.
// Will be slower and use more memory than `repr` but convenient for
// visualizing smaller structures.
export function strRepr(m :Module, options? :Partial<Options>) :string {
  const w = BufferedWriter()
  repr(m, w, options)
  return w.toString()
}

export function strReprBuffer(
  buffer          :Uint8Array|ArrayBuffer,
  limit?          :number,
  highlightRange? :readonly number[],
  options?        :Partial<Options>) :string
{
  const w = BufferedWriter()
  reprBuffer(buffer, w, limit, highlightRange, options)
  return w.toString()
}
