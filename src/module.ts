// Section and module decoder.
//
//   module   = magic version section*
//   section  = id:u8 size:u32 payload   ; payload is exactly `size` bytes
//
// Sections are decoded in the order they appear; their order and
// cardinality are not checked.
//
import type { uint8, uint32 } from './basic-types'
import type {
  Module, Section, KnownSectionKind, Import, ImportDesc, Export, ExternalKind,
  Global, ElemSegment, ElemMode, ElemInit, DataSegment, FunctionBody, Locals, RefType,
} from './ast'
import { sectionKinds } from './ast'
import { Cursor } from './cursor'
import { DecodeError, hex } from './errors'
import { readExpr } from './instr'
import type { Writer } from './repr'
import {
  readValType, readRefType, readFuncType, readTableType, readMemType, readGlobalType,
} from './types'

export const MAGIC   = 0x6d736100  // "\0asm" read little-endian
export const VERSION = 1

export interface DecodeOptions {
  readonly strict?   :boolean  // reject non-canonical integers, reserved bytes and unknown versions
  readonly maxDepth? :number   // deepest permitted block nesting
  readonly trace?    :Writer   // receives a line for every decoded section
}

//——————————————————————————————————————————————————————————————————————————————
// Imports and exports

const externalKinds :ExternalKind[] = ['func', 'table', 'memory', 'global']

function readExternalKind(c :Cursor) :ExternalKind {
  const start = c.pos
  const b = c.u8()
  if (b >= externalKinds.length) {
    throw new DecodeError('invalid-discriminant', `invalid external kind ${hex(b)}`, start,
      { actual: b, expected: '0x00 func, 0x01 table, 0x02 memory or 0x03 global' })
  }
  return externalKinds[b]
}

function readImportDesc(c :Cursor) :ImportDesc {
  const kind = readExternalKind(c)
  switch (kind) {
    case 'func':   return { kind, type: c.u32() }
    case 'table':  return { kind, table: readTableType(c) }
    case 'memory': return { kind, memory: readMemType(c) }
    case 'global': return { kind, global: readGlobalType(c) }
  }
}

function readImport(c :Cursor) :Import {
  const module = c.name()
  const name = c.name()
  return { module, name, desc: readImportDesc(c) }
}

function readExport(c :Cursor) :Export {
  const name = c.name()
  const kind = readExternalKind(c)
  return { name, desc: { kind, index: c.u32() } }
}

function readGlobal(c :Cursor) :Global {
  const type = readGlobalType(c)
  return { type, init: readExpr(c) }
}

//——————————————————————————————————————————————————————————————————————————————
// Segments

// Element kind of the legacy element forms. 0x00 is the only one defined.
function readElemKind(c :Cursor) :RefType {
  const start = c.pos
  const b = c.u8()
  if (b != 0x00) {
    throw new DecodeError('invalid-discriminant', `invalid element kind ${hex(b)}`, start,
      { actual: b, expected: '0x00 (funcref)' })
  }
  return 'funcref'
}

const readIndex = (c :Cursor) :uint32 => c.u32()

// Element segment flags:
//   bit 0  passive or declarative (else active)
//   bit 1  declarative when bit 0 is set; explicit table index when it's not
//   bit 2  elements are constant expressions (else function indices)
function readElemSegment(c :Cursor) :ElemSegment {
  const start = c.pos
  const flags = c.u32()
  if (flags > 7) {
    throw new DecodeError('invalid-discriminant', `invalid element segment flags ${flags}`, start,
      { end: c.pos, actual: flags, expected: '0-7' })
  }
  const exprs = (flags & 4) != 0
  let mode :ElemMode
  let type :RefType = 'funcref'
  if ((flags & 1) == 0) {
    const table = (flags & 2) ? c.u32() : 0
    mode = { kind: 'active', table, offset: readExpr(c) }
    if (flags & 2) {
      type = exprs ? readRefType(c) : readElemKind(c)
    }
  } else {
    mode = (flags & 2) ? { kind: 'declarative' } : { kind: 'passive' }
    type = exprs ? readRefType(c) : readElemKind(c)
  }
  const init :ElemInit = exprs ?
    { kind: 'exprs', exprs: c.vec(readExpr) } :
    { kind: 'funcs', funcs: c.vec(readIndex) }
  return { flags, mode, type, init }
}

function readDataSegment(c :Cursor) :DataSegment {
  const start = c.pos
  const flags = c.u32()
  switch (flags) {
    case 0: {
      const offset = readExpr(c)
      return { mode: { kind: 'active', memory: 0, offset }, init: c.bytes() }
    }
    case 1: {
      return { mode: { kind: 'passive' }, init: c.bytes() }
    }
    case 2: {
      const memory = c.u32()
      const offset = readExpr(c)
      return { mode: { kind: 'active', memory, offset }, init: c.bytes() }
    }
    default:
      throw new DecodeError('invalid-discriminant', `invalid data segment flags ${flags}`, start,
        { end: c.pos, actual: flags, expected: '0-2' })
  }
}

//——————————————————————————————————————————————————————————————————————————————
// Code

function readLocals(c :Cursor) :Locals {
  const count = c.u32()
  return { count, type: readValType(c) }
}

function readFunctionBody(c :Cursor) :FunctionBody {
  const size = c.u32()
  const f = c.frame(size, 'function body')
  const locals = f.vec(readLocals)
  const code = readExpr(f)
  f.expectEnd()
  return { size, locals, code }
}

//——————————————————————————————————————————————————————————————————————————————
// Sections

function readPayload(kind :KnownSectionKind, c :Cursor) :Section {
  switch (kind) {
    case 'custom': {
      const name = c.name()
      return { kind, name, bytes: c.rest() }
    }
    case 'type':       return { kind, types: c.vec(readFuncType) }
    case 'import':     return { kind, imports: c.vec(readImport) }
    case 'function':   return { kind, types: c.vec(readIndex) }
    case 'table':      return { kind, tables: c.vec(readTableType) }
    case 'memory':     return { kind, memories: c.vec(readMemType) }
    case 'global':     return { kind, globals: c.vec(readGlobal) }
    case 'export':     return { kind, exports: c.vec(readExport) }
    case 'start':      return { kind, func: c.u32() }
    case 'element':    return { kind, segments: c.vec(readElemSegment) }
    case 'code':       return { kind, bodies: c.vec(readFunctionBody) }
    case 'data':       return { kind, segments: c.vec(readDataSegment) }
    case 'data_count': return { kind, count: c.u32() }
  }
}

export function readSection(c :Cursor, trace? :Writer) :Section {
  const start = c.pos
  const id :uint8 = c.u8()
  const size = c.u32()
  const kind = sectionKinds.get(id)
  const p = c.frame(size, `${kind || 'unknown'} section`)
  const section :Section = kind === undefined ?
    { kind: 'unknown', id, bytes: p.rest() } :
    readPayload(kind, p)
  p.expectEnd()
  if (trace) {
    trace(`${section.kind} section @${start} ${size} bytes`)
  }
  return section
}

//——————————————————————————————————————————————————————————————————————————————
// Module

function readPreamble(c :Cursor) :[uint32, uint32] {
  const magic = c.u32le()
  if (magic != MAGIC) {
    throw new DecodeError('invalid-preamble', 'not a WebAssembly module (bad magic)', 0,
      { end: 4, actual: magic, expected: '00 61 73 6d' })
  }
  const version = c.u32le()
  if (version != VERSION && c.strict) {
    throw new DecodeError('invalid-preamble', `unsupported version ${version}`, 4,
      { end: 8, actual: version, expected: String(VERSION) })
  }
  return [magic, version]
}

// Decodes a complete module. Throws a DecodeError describing the first
// problem found; there are no partial results.
export function decode(input :Uint8Array|ArrayBuffer, options? :DecodeOptions) :Module {
  const trace = options ? options.trace : undefined
  const buf = input instanceof Uint8Array ? input : new Uint8Array(input)
  const c = new Cursor(buf, options)

  const [magic, version] = readPreamble(c)
  const sections :Section[] = []
  while (!c.eof) {
    sections.push(readSection(c, trace))
  }
  return { magic, version, sections }
}
