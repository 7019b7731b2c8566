import { describe, it, expect } from 'vitest'
import { Cursor } from '../src/cursor'
import {
  readValType, readRefType, readLimits, readFuncType, readTableType, readGlobalType,
} from '../src/types'
import { decodeError } from './util'

const cursor = (bytes :number[]) => new Cursor(new Uint8Array(bytes))

describe('types', () => {
  it('reads every value type', () => {
    const c = cursor([0x7f, 0x7e, 0x7d, 0x7c, 0x7b, 0x70, 0x6f])
    const types :string[] = []
    while (!c.eof) {
      types.push(readValType(c))
    }
    expect(types).toEqual(['i32', 'i64', 'f32', 'f64', 'v128', 'funcref', 'externref'])
  })

  it('rejects unknown value types', () => {
    const err = decodeError(() => readValType(cursor([0x7a])))
    expect(err.kind).toBe('invalid-discriminant')
    expect(err.actual).toBe(0x7a)
    expect(err.message).toBe('invalid value type 0x7a at offset 0x0')
  })

  it('reads reference types only', () => {
    expect(readRefType(cursor([0x70]))).toBe('funcref')
    expect(readRefType(cursor([0x6f]))).toBe('externref')
    expect(decodeError(() => readRefType(cursor([0x7f]))).kind).toBe('invalid-discriminant')
  })

  it('reads limits', () => {
    expect(readLimits(cursor([0x00, 0x05]))).toEqual({ min: 5 })
    expect(readLimits(cursor([0x01, 0x01, 0x80, 0x02]))).toEqual({ min: 1, max: 256 })
    expect(decodeError(() => readLimits(cursor([0x02, 0x00]))).kind).toBe('invalid-discriminant')
  })

  it('reads function types', () => {
    expect(readFuncType(cursor([0x60, 0x02, 0x7f, 0x7e, 0x01, 0x7c])))
      .toEqual({ params: ['i32', 'i64'], results: ['f64'] })
    expect(readFuncType(cursor([0x60, 0x00, 0x00]))).toEqual({ params: [], results: [] })
    const err = decodeError(() => readFuncType(cursor([0x61, 0x00, 0x00])))
    expect(err.kind).toBe('invalid-discriminant')
    expect(err.message).toBe('invalid function type form 0x61 at offset 0x0')
  })

  it('reads table types', () => {
    expect(readTableType(cursor([0x70, 0x00, 0x01])))
      .toEqual({ elem: 'funcref', limits: { min: 1 } })
  })

  it('reads global types', () => {
    expect(readGlobalType(cursor([0x7f, 0x00]))).toEqual({ type: 'i32', mutable: false })
    expect(readGlobalType(cursor([0x7c, 0x01]))).toEqual({ type: 'f64', mutable: true })
    const err = decodeError(() => readGlobalType(cursor([0x7f, 0x02])))
    expect(err.kind).toBe('invalid-discriminant')
    expect(err.offset).toBe(1)
  })
})
