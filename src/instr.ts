// Instruction decoder.
//
// Dispatch maps are generated from the opcode tables in info.ts: every
// table entry gets the reader for its immediate shape. Structured
// instructions (block, loop, if) read their nested sequences recursively,
// one call level per nesting level, bounded by the cursor's maxDepth.
//
import type { uint8, uint32 } from './basic-types'
import type { Instr, BlockType, MemArg, Expr } from './ast'
import type { Cursor } from './cursor'
import { DecodeError, hex } from './errors'
import { single, misc, simd, prefix } from './info'
import { readValType, readRefType, valTypeOf } from './types'

type Reader = (c :Cursor, depth :number) => Instr

const singleReaders = new Map<uint32, Reader>()
const miscReaders = new Map<uint32, Reader>()
const simdReaders = new Map<uint32, Reader>()

function register<N extends string>(
  m      :Map<uint32, Reader>,
  ops    :{ readonly [code :number] :N },
  reader :(op :N) => Reader,
) {
  for (const k of Object.keys(ops)) {
    const code = Number(k)
    m.set(code, reader(ops[code]))
  }
}

//——————————————————————————————————————————————————————————————————————————————
// Immediates

export function readMemArg(c :Cursor) :MemArg {
  const align = c.u32()
  const offset = c.u32()
  return { align, offset }
}

// 0x40 is the empty type; a value type byte is a single result; anything
// else is a non-negative signed 33-bit type index.
export function readBlockType(c :Cursor) :BlockType {
  const b = c.peek()
  if (b == 0x40) {
    c.u8()
    return { kind: 'empty' }
  }
  const type = valTypeOf(b)
  if (type !== undefined) {
    c.u8()
    return { kind: 'value', type }
  }
  const start = c.pos
  const index = c.s33()
  if (index < 0) {
    throw new DecodeError('invalid-discriminant', `invalid block type ${index}`, start,
      { end: c.pos, actual: index, expected: '0x40, a value type or a type index' })
  }
  return { kind: 'index', index }
}

function readLanes(c :Cursor, n :number) :uint8[] {
  const lanes :uint8[] = []
  for (let i = 0; i < n; ++i) {
    lanes.push(c.u8())
  }
  return lanes
}

//——————————————————————————————————————————————————————————————————————————————
// Sequences

type Terminator = 'end' | 'else'

const END  = 0x0b
const ELSE = 0x05

// Reads instructions up to and including the `end` (or, when allowElse is
// set, `else`) that closes the current nesting level.
function readBody(c :Cursor, depth :number, allowElse :boolean) :[Instr[], Terminator] {
  const body :Instr[] = []
  while (true) {
    const b = c.peek()
    if (b == END) {
      c.u8()
      return [body, 'end']
    }
    if (b == ELSE && allowElse) {
      c.u8()
      return [body, 'else']
    }
    body.push(readInstr(c, depth))
  }
}

// Fails unless another level of nesting is permitted
function enter(c :Cursor, depth :number, start :uint32) :number {
  if (depth + 1 > c.options.maxDepth) {
    throw new DecodeError('recursion-depth-exceeded',
      `blocks nested deeper than ${c.options.maxDepth} levels`, start,
      { actual: depth + 1, expected: `at most ${c.options.maxDepth}` })
  }
  return depth + 1
}

// Reads an instruction sequence terminated by `end`, e.g. a function body
// or a constant expression
export function readExpr(c :Cursor) :Expr {
  return readBody(c, 0, false)[0]
}

//——————————————————————————————————————————————————————————————————————————————
// Single-byte opcodes

register(singleReaders, single.none, op => () => ({ op }))

register(singleReaders, single.block, op => (c, depth) => {
  const start = c.pos - 1
  const type = readBlockType(c)
  const [body] = readBody(c, enter(c, depth, start), false)
  return { op, type, body }
})

register(singleReaders, single.if, () => (c, depth) => {
  const start = c.pos - 1
  const type = readBlockType(c)
  const inner = enter(c, depth, start)
  const [then_, term] = readBody(c, inner, true)
  if (term == 'end') {
    return { op: 'if', type, then_ }
  }
  const [else_] = readBody(c, inner, false)
  return { op: 'if_else', type, then_, else_ }
})

register(singleReaders, single.label, op => c => ({ op, label: c.u32() }))

register(singleReaders, single.br_table, op => c => {
  const labels = c.vec(c => c.u32())
  return { op, labels, defaultLabel: c.u32() }
})

register(singleReaders, single.func, op => c => ({ op, func: c.u32() }))

register(singleReaders, single.call_indirect, op => c => {
  const type = c.u32()
  return { op, type, table: c.u32() }
})

register(singleReaders, single.ref_type, op => c => ({ op, type: readRefType(c) }))
register(singleReaders, single.select_t, op => c => ({ op, types: c.vec(readValType) }))
register(singleReaders, single.local, op => c => ({ op, local: c.u32() }))
register(singleReaders, single.global, op => c => ({ op, global: c.u32() }))
register(singleReaders, single.table, op => c => ({ op, table: c.u32() }))
register(singleReaders, single.memarg, op => c => ({ op, memarg: readMemArg(c) }))

register(singleReaders, single.memory, op => c => {
  c.zero(op)
  return { op }
})

register(singleReaders, single.i32, op => c => ({ op, value: c.s32() }))
register(singleReaders, single.i64, op => c => ({ op, value: c.s64() }))
register(singleReaders, single.f32, op => c => ({ op, value: c.f32() }))
register(singleReaders, single.f64, op => c => ({ op, value: c.f64() }))

//——————————————————————————————————————————————————————————————————————————————
// 0xFC prefix

register(miscReaders, misc.none, op => () => ({ op }))

register(miscReaders, misc.data_memory, op => c => {
  const data = c.u32()
  c.zero(op)
  return { op, data }
})

register(miscReaders, misc.data, op => c => ({ op, data: c.u32() }))

register(miscReaders, misc.memory_memory, op => c => {
  c.zero(op)
  c.zero(op)
  return { op }
})

register(miscReaders, misc.memory, op => c => {
  c.zero(op)
  return { op }
})

register(miscReaders, misc.elem_table, op => c => {
  const elem = c.u32()
  return { op, elem, table: c.u32() }
})

register(miscReaders, misc.elem, op => c => ({ op, elem: c.u32() }))

register(miscReaders, misc.table_table, op => c => {
  const dst = c.u32()
  return { op, dst, src: c.u32() }
})

register(miscReaders, misc.table, op => c => ({ op, table: c.u32() }))

//——————————————————————————————————————————————————————————————————————————————
// 0xFD prefix

register(simdReaders, simd.none, op => () => ({ op }))
register(simdReaders, simd.memarg, op => c => ({ op, memarg: readMemArg(c) }))

register(simdReaders, simd.memarg_lane, op => c => {
  const memarg = readMemArg(c)
  return { op, memarg, lane: c.u8() }
})

register(simdReaders, simd.v128, op => c => ({ op, bytes: c.take(16) }))
register(simdReaders, simd.shuffle, op => c => ({ op, lanes: readLanes(c, 16) }))
register(simdReaders, simd.lane, op => c => ({ op, lane: c.u8() }))

//——————————————————————————————————————————————————————————————————————————————

function invalidOpcode(pfx :uint8|null, code :uint32, start :uint32, end :uint32) {
  if (pfx === null && (code == END || code == ELSE)) {
    return new DecodeError('invalid-opcode', `unexpected ${code == END ? 'end' : 'else'}`, start,
      { end, actual: code, expected: 'an instruction' })
  }
  const name = pfx === null ? hex(code) : `${hex(pfx)} ${code}`
  return new DecodeError('invalid-opcode', `invalid opcode ${name}`, start,
    { end, actual: code, expected: 'an instruction' })
}

// Reads one instruction. `depth` is the nesting level of the sequence the
// instruction belongs to.
export function readInstr(c :Cursor, depth :number = 0) :Instr {
  const start = c.pos
  const b = c.u8()
  let readers = singleReaders
  let pfx :uint8|null = null
  let code :uint32 = b
  if (b == prefix.misc || b == prefix.simd) {
    pfx = b
    readers = b == prefix.misc ? miscReaders : simdReaders
    code = c.u32()
  }
  const read = readers.get(code)
  if (!read) {
    throw invalidOpcode(pfx, code, start, c.pos)
  }
  return read(c, depth)
}
