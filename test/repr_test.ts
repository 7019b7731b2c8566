import { describe, it, expect } from 'vitest'
import type { Instr, Module } from '../src/ast'
import { printCode } from '../src/lbtext'
import { decode } from '../src/module'
import { strRepr, strReprBuffer } from '../src/repr'
import { body, module, preamble, section, vec } from './util'

const small :Module = decode(module(
  section(1, vec([[0x60, 0x01, 0x7f, 0x01, 0x7f]])),
  section(3, vec([[0x00]])),
  section(10, vec([body([], [0x20, 0x00, 0x0b])])),
))

describe('repr', () => {
  it('prints a module as nested lists', () => {
    expect(strRepr(small, { colors: false })).toBe([
      '(module 1',
      '  (type',
      '    (func (i32) i32))',
      '  (function 0)',
      '  (code',
      '    (function_body',
      '      (local.get [0]))))',
    ].join('\n'))
  })

  it('prints value types when asked', () => {
    expect(strRepr(small, { colors: false, detailedTypes: true })).toContain('\n  (function u32(0))\n')
  })

  it('separates immediates with immSeparator', () => {
    expect(strRepr(small, { colors: false, immSeparator: ':' })).toContain('(local.get:[0])')
  })

  it('takes the default for an option given as undefined', () => {
    expect(strRepr(small, { colors: false, immSeparator: undefined })).toContain('(local.get [0])')
  })

  it('colors opcodes by default', () => {
    expect(strRepr(small)).toContain('(\x1B[96mlocal.get\x1B[0m')
  })
})

describe('reprBuffer', () => {
  it('prints 16 bytes per line in groups of four', () => {
    const bytes = new Uint8Array(Array.from({ length: 20 }, (_, i) => i))
    expect(strReprBuffer(bytes, undefined, undefined, { colors: false })).toBe(
      '00 01 02 03  04 05 06 07  08 09 0a 0b  0c 0d 0e 0f\n' +
      '10 11 12 13\n')
    expect(strReprBuffer(bytes, 2, undefined, { colors: false })).toBe('00 01\n')
  })

  it('highlights a byte range', () => {
    expect(strReprBuffer(new Uint8Array(preamble), undefined, [4, 8], { colors: false }))
      .toBe('00 61 73 6d  [01] [00] [00] [00]\n')
  })

  it('marks a range that starts past the end', () => {
    expect(strReprBuffer(new Uint8Array([0x00, 0x61]), undefined, [2], { colors: false }))
      .toBe('00 61 [..]\n')
  })
})

describe('printCode', () => {
  const lines = (code :Instr[]) => {
    const out :string[] = []
    printCode(code, s => { out.push(s.replace(/\n$/, '')) })
    return out
  }

  it('prints immediates in text format', () => {
    expect(lines([
      { op: 'call_indirect', type: 5, table: 1 },
      { op: 'i32.load', memarg: { align: 2, offset: 16 } },
      { op: 'i64.load8_u', memarg: { align: 0, offset: 0 } },
      { op: 'br_table', labels: [1, 2], defaultLabel: 0 },
      { op: 'select_t', types: ['f64'] },
      { op: 'ref.null', type: 'externref' },
      { op: 'table.init', elem: 3, table: 1 },
      { op: 'table.copy', dst: 2, src: 0 },
      { op: 'memory.size' },
      { op: 'f32.const', value: 1.5 },
      { op: 'i64.const', value: -7n },
      { op: 'v128.load8_lane', memarg: { align: 0, offset: 4 }, lane: 9 },
      { op: 'i8x16.extract_lane_s', lane: 3 },
    ])).toEqual([
      'call_indirect 1 (type 5)',
      'i32.load offset=16 align=4',
      'i64.load8_u align=1',
      'br_table 1 2 0',
      'select (result f64)',
      'ref.null extern',
      'table.init 1 3',
      'table.copy 2 0',
      'memory.size',
      'f32.const 1.5',
      'i64.const -7',
      'v128.load8_lane offset=4 align=1 9',
      'i8x16.extract_lane_s 3',
    ])
  })

  it('indents nested blocks', () => {
    expect(lines([
      { op: 'block', type: { kind: 'index', index: 3 }, body: [
        { op: 'loop', type: { kind: 'empty' }, body: [{ op: 'br', label: 1 }] },
      ] },
      { op: 'if', type: { kind: 'empty' }, then_: [{ op: 'nop' }] },
    ])).toEqual([
      'block (type 3)',
      '  loop',
      '    br 1',
      '  end',
      'end',
      'if',
      '  nop',
      'end',
    ])
  })
})
