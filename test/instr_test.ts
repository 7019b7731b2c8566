import { describe, it, expect } from 'vitest'
import type { Instr } from '../src/ast'
import { Cursor } from '../src/cursor'
import { opcodeEntries, type OpcodeEntry } from '../src/info'
import { readInstr, readExpr, readBlockType } from '../src/instr'
import { decodeError, f32, f64, s32, s64, u32, type Bytes } from './util'

const cursor = (bytes :Bytes, strict = true, maxDepth = 1024) =>
  new Cursor(new Uint8Array(bytes), { strict, maxDepth })

const lanes = Array.from({ length: 16 }, (_, i) => i)

// Canonical immediate bytes for each shape, and the fields they decode to
const samples :{ readonly [shape :string] :[Bytes, object] } = {
  none:          [[], {}],
  block:         [[0x40, 0x0b], { type: { kind: 'empty' }, body: [] }],
  if:            [[0x40, 0x0b], { type: { kind: 'empty' }, then_: [] }],
  label:         [[0x03], { label: 3 }],
  br_table:      [[0x02, 0x01, 0x02, 0x00], { labels: [1, 2], defaultLabel: 0 }],
  func:          [u32(300), { func: 300 }],
  call_indirect: [[0x05, 0x01], { type: 5, table: 1 }],
  ref_type:      [[0x6f], { type: 'externref' }],
  select_t:      [[0x01, 0x7f], { types: ['i32'] }],
  local:         [[0x07], { local: 7 }],
  global:        [[0x07], { global: 7 }],
  table:         [[0x07], { table: 7 }],
  memarg:        [[0x02, 0x10], { memarg: { align: 2, offset: 16 } }],
  memory:        [[0x00], {}],
  i32:           [s32(-5), { value: -5 }],
  i64:           [s64(-5n), { value: -5n }],
  f32:           [f32(1.5), { value: 1.5 }],
  f64:           [f64(2.25), { value: 2.25 }],
  data_memory:   [[0x04, 0x00], { data: 4 }],
  data:          [[0x04], { data: 4 }],
  memory_memory: [[0x00, 0x00], {}],
  elem_table:    [[0x03, 0x01], { elem: 3, table: 1 }],
  elem:          [[0x03], { elem: 3 }],
  table_table:   [[0x02, 0x01], { dst: 2, src: 1 }],
  memarg_lane:   [[0x00, 0x08, 0x03], { memarg: { align: 0, offset: 8 }, lane: 3 }],
  v128:          [lanes, { bytes: new Uint8Array(lanes) }],
  shuffle:       [lanes, { lanes }],
  lane:          [[0x05], { lane: 5 }],
}

const opcodeBytes = (e :OpcodeEntry) :Bytes =>
  e.prefix === null ? [e.code] : [e.prefix, ...u32(e.code)]

describe('opcode table', () => {
  const entries = opcodeEntries()

  it('covers all three tiers', () => {
    expect(entries.filter(e => e.prefix === null).length).toBe(181)
    expect(entries.filter(e => e.prefix === 0xfc).length).toBe(18)
    expect(entries.filter(e => e.prefix === 0xfd).length).toBe(236)
  })

  it('gives every opcode a distinct name', () => {
    expect(new Set(entries.map(e => e.name)).size).toBe(entries.length)
  })

  it('decodes every opcode with its immediates', () => {
    for (const e of entries) {
      const [imm, fields] = samples[e.imm]
      const bytes = [...opcodeBytes(e), ...imm]
      const c = cursor(bytes)
      const instr = readInstr(c)
      expect(instr, e.name).toEqual({ op: e.name, ...fields })
      expect(c.pos, e.name).toBe(bytes.length)
    }
  })
})

describe('instructions', () => {
  it('reads sign-extension and saturating truncation operators', () => {
    expect(readInstr(cursor([0xc4]))).toEqual({ op: 'i64.extend32_s' })
    expect(readInstr(cursor([0xfc, 0x07]))).toEqual({ op: 'i64.trunc_sat_f64_u' })
  })

  it('reads sub-opcodes that take more than one byte', () => {
    expect(readInstr(cursor([0xfd, 0x80, 0x01]))).toEqual({ op: 'i16x8.abs' })
    expect(readInstr(cursor([0xfd, 0xec, 0x80, 0x00]))).toEqual({ op: 'i8x16.shr_s' })
  })

  it('reads extreme constants', () => {
    expect(readInstr(cursor([0x41, ...s32(-2147483648)]))).toEqual({ op: 'i32.const', value: -2147483648 })
    expect(readInstr(cursor([0x42, ...s64(-(1n << 63n))])))
      .toEqual({ op: 'i64.const', value: -(1n << 63n) })
  })

  it('rejects unknown opcodes', () => {
    const err = decodeError(() => readInstr(cursor([0x06])))
    expect(err.kind).toBe('invalid-opcode')
    expect(err.message).toBe('invalid opcode 0x06 at offset 0x0')
    expect(err.actual).toBe(0x06)
  })

  it('rejects unknown sub-opcodes of both prefixes', () => {
    const misc = decodeError(() => readInstr(cursor([0xfc, 0x12])))
    expect(misc.kind).toBe('invalid-opcode')
    expect(misc.message).toBe('invalid opcode 0xfc 18 at offset 0x0')
    const c = cursor([0x01, 0xfd, 0x9a, 0x01])
    readInstr(c)
    const simd = decodeError(() => readInstr(c))
    expect(simd.message).toBe('invalid opcode 0xfd 154 at offset 0x1')
    expect(simd.byteRange).toEqual([1, 4])
  })

  it('rejects unknown sub-opcodes in permissive mode too', () => {
    expect(decodeError(() => readInstr(cursor([0xfd, 0x9a, 0x01], false))).kind).toBe('invalid-opcode')
    expect(decodeError(() => readInstr(cursor([0xfc, 0x12], false))).kind).toBe('invalid-opcode')
    expect(decodeError(() => readInstr(cursor([0x06], false))).kind).toBe('invalid-opcode')
  })

  it('requires reserved bytes to be zero', () => {
    expect(decodeError(() => readInstr(cursor([0x3f, 0x01]))).kind).toBe('invalid-discriminant')
    expect(decodeError(() => readInstr(cursor([0xfc, 0x0a, 0x00, 0x01]))).kind).toBe('invalid-discriminant')
    expect(readInstr(cursor([0x40, 0x01], false))).toEqual({ op: 'memory.grow' })
    expect(readInstr(cursor([0xfc, 0x08, 0x02, 0x05], false))).toEqual({ op: 'memory.init', data: 2 })
  })
})

describe('block types', () => {
  it('reads the empty type, value types and type indices', () => {
    expect(readBlockType(cursor([0x40]))).toEqual({ kind: 'empty' })
    expect(readBlockType(cursor([0x7e]))).toEqual({ kind: 'value', type: 'i64' })
    expect(readBlockType(cursor([0x6f]))).toEqual({ kind: 'value', type: 'externref' })
    expect(readBlockType(cursor([0x05]))).toEqual({ kind: 'index', index: 5 })
    expect(readBlockType(cursor([0x80, 0x01]))).toEqual({ kind: 'index', index: 128 })
  })

  it('rejects negative type indices', () => {
    const err = decodeError(() => readBlockType(cursor([0x7a])))
    expect(err.kind).toBe('invalid-discriminant')
    expect(err.message).toBe('invalid block type -6 at offset 0x0')
  })
})

describe('structured instructions', () => {
  it('reads nested blocks', () => {
    const code = [
      0x02, 0x7f,       // block (result i32)
      0x03, 0x40,       //   loop
      0x0c, 0x01,       //     br 1
      0x0b,             //   end
      0x41, 0x07,       //   i32.const 7
      0x0b,             // end
      0x0b,
    ]
    const expected :Instr[] = [{
      op: 'block',
      type: { kind: 'value', type: 'i32' },
      body: [
        { op: 'loop', type: { kind: 'empty' }, body: [{ op: 'br', label: 1 }] },
        { op: 'i32.const', value: 7 },
      ],
    }]
    expect(readExpr(cursor(code))).toEqual(expected)
  })

  it('reads if without else', () => {
    expect(readExpr(cursor([0x04, 0x40, 0x01, 0x0b, 0x0b]))).toEqual([
      { op: 'if', type: { kind: 'empty' }, then_: [{ op: 'nop' }] },
    ])
  })

  it('reads if with else', () => {
    expect(readExpr(cursor([0x04, 0x40, 0x01, 0x05, 0x00, 0x0b, 0x0b]))).toEqual([
      { op: 'if_else', type: { kind: 'empty' }, then_: [{ op: 'nop' }], else_: [{ op: 'unreachable' }] },
    ])
  })

  it('matches each else and end to its own if', () => {
    const code = [
      0x04, 0x40,             // if
      0x04, 0x40,             //   if
      0x01,                   //     nop
      0x05,                   //   else
      0x00,                   //     unreachable
      0x0b,                   //   end
      0x05,                   // else
      0x01,                   //   nop
      0x0b,                   // end
      0x0b,
    ]
    expect(readExpr(cursor(code))).toEqual([{
      op: 'if_else',
      type: { kind: 'empty' },
      then_: [
        { op: 'if_else', type: { kind: 'empty' }, then_: [{ op: 'nop' }], else_: [{ op: 'unreachable' }] },
      ],
      else_: [{ op: 'nop' }],
    }])
  })

  it('allows an empty else branch', () => {
    expect(readExpr(cursor([0x04, 0x40, 0x05, 0x0b, 0x0b]))).toEqual([
      { op: 'if_else', type: { kind: 'empty' }, then_: [], else_: [] },
    ])
  })

  it('rejects else outside of if', () => {
    const err = decodeError(() => readExpr(cursor([0x02, 0x40, 0x05, 0x0b, 0x0b])))
    expect(err.kind).toBe('invalid-opcode')
    expect(err.message).toBe('unexpected else at offset 0x2')
  })

  it('fails when a block is not closed', () => {
    expect(decodeError(() => readExpr(cursor([0x02, 0x40, 0x01]))).kind).toBe('end-of-input')
  })
})

describe('nesting limit', () => {
  const nested = (n :number) => [
    ...Array.from({ length: n }, () => [0x02, 0x40]).flat(),
    ...Array.from({ length: n }, () => 0x0b),
    0x0b,
  ]

  it('allows nesting up to maxDepth', () => {
    const c = cursor(nested(3), true, 3)
    const [outer] = readExpr(c)
    expect(outer).toEqual({
      op: 'block', type: { kind: 'empty' }, body: [
        { op: 'block', type: { kind: 'empty' }, body: [
          { op: 'block', type: { kind: 'empty' }, body: [] },
        ] },
      ],
    })
    expect(c.eof).toBe(true)
  })

  it('fails one level past maxDepth', () => {
    const err = decodeError(() => readExpr(cursor(nested(4), true, 3)))
    expect(err.kind).toBe('recursion-depth-exceeded')
    expect(err.offset).toBe(6)
    expect(err.actual).toBe(4)
  })

  it('counts if and else bodies as one level', () => {
    const code = [0x04, 0x40, 0x05, 0x02, 0x40, 0x0b, 0x0b, 0x0b]
    expect(decodeError(() => readExpr(cursor(code, true, 1))).kind).toBe('recursion-depth-exceeded')
    expect(readExpr(cursor(code, true, 2))).toHaveLength(1)
  })

  it('fails on 10 000 nested blocks instead of overflowing the stack', () => {
    const err = decodeError(() => readExpr(cursor(nested(10000))))
    expect(err.kind).toBe('recursion-depth-exceeded')
    expect(err.offset).toBe(2 * 1024)
  })
})
