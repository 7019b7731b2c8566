// Linear bytecode textual representation.
// https://webassembly.github.io/spec/core/text/instructions.html
//
import type { Instr, BlockType, MemArg } from './ast'
import type { Writer } from './repr'

interface Ctx {
  writeln(depth :number, s :string) :void
}

export function fmtBlockType(t :BlockType) :string {
  switch (t.kind) {
    case 'empty': return ''
    case 'value': return ` (result ${t.type})`
    case 'index': return ` (type ${t.index})`
  }
}

export function fmtMemArg(m :MemArg) :string {
  return (m.offset != 0 ? ` offset=${m.offset}` : '') + ` align=${Math.pow(2, m.align)}`
}

// Immediates of a non-structured instruction, with a leading space.
// "" when the instruction has none.
export function fmtimm(n :Instr) :string {
  if (n.op == 'call_indirect') {
    return ` ${n.table} (type ${n.type})`
  }
  if (n.op == 'ref.null') {
    return ' ' + (n.type == 'funcref' ? 'func' : 'extern')
  }
  if ('elem' in n) {
    return 'table' in n ? ` ${n.table} ${n.elem}` : ` ${n.elem}`
  }
  if ('memarg' in n) {
    return fmtMemArg(n.memarg) + ('lane' in n ? ` ${n.lane}` : '')
  }
  if ('table' in n)  { return ` ${n.table}` }
  if ('dst' in n)    { return ` ${n.dst} ${n.src}` }
  if ('label' in n)  { return ` ${n.label}` }
  if ('labels' in n) { return [...n.labels, n.defaultLabel].map(l => ' ' + l).join('') }
  if ('func' in n)   { return ` ${n.func}` }
  if ('local' in n)  { return ` ${n.local}` }
  if ('global' in n) { return ` ${n.global}` }
  if ('data' in n)   { return ` ${n.data}` }
  if ('types' in n)  { return n.types.length ? ` (result ${n.types.join(' ')})` : '' }
  if ('value' in n)  { return ' ' + n.value.toString() }
  if ('bytes' in n)  { return ' i8x16 ' + Array.from(n.bytes).join(' ') }
  if ('lanes' in n)  { return ' ' + n.lanes.join(' ') }
  if ('lane' in n)   { return ` ${n.lane}` }
  return ''
}

// Text-format name of an instruction. select_t and if_else are spelled
// `select` and `if` in text.
export function opname(n :Instr) :string {
  switch (n.op) {
    case 'select_t': return 'select'
    case 'if_else':  return 'if'
    default:         return n.op
  }
}

function visitOps(nodes :Instr[], c :Ctx, depth :number) {
  for (let n of nodes) {
    visitOp(n, c, depth)
  }
}

function visitOp(n :Instr, c :Ctx, depth :number) {
  if ('body' in n) {
    c.writeln(depth, n.op + fmtBlockType(n.type))
    visitOps(n.body, c, depth + 1)
    return c.writeln(depth, 'end')
  }
  if ('then_' in n) {
    c.writeln(depth, 'if' + fmtBlockType(n.type))
    visitOps(n.then_, c, depth + 1)
    if ('else_' in n) {
      c.writeln(depth, 'else')
      visitOps(n.else_, c, depth + 1)
    }
    return c.writeln(depth, 'end')
  }
  c.writeln(depth, opname(n) + fmtimm(n))
}

// Writes one line per instruction, nested sequences indented by two spaces
export function printCode(instructions :Instr[], writer :Writer) {
  const ctx = {
    writeln(depth :number, chunk :string) {
      writer(' '.repeat(depth * 2) + chunk + '\n')
    },
  }

  visitOps(instructions, ctx, 0)
}
