import type { uint8 } from './basic-types'
import type { ValType, RefType, Limits, FuncType, TableType, MemType, GlobalType } from './ast'
import type { Cursor } from './cursor'
import { DecodeError, hex } from './errors'

const valtypes = new Map<uint8, ValType>([
  [0x7f, 'i32'],
  [0x7e, 'i64'],
  [0x7d, 'f32'],
  [0x7c, 'f64'],
  [0x7b, 'v128'],
  [0x70, 'funcref'],
  [0x6f, 'externref'],
])

const reftypes = new Map<uint8, RefType>([
  [0x70, 'funcref'],
  [0x6f, 'externref'],
])

// Byte of a value type, or undefined when b is not one.
// Used by block types, which peek before committing.
export function valTypeOf(b :uint8) :ValType|undefined {
  return valtypes.get(b)
}

function unexpected(what :string, b :uint8, offset :number, expected :string) {
  return new DecodeError('invalid-discriminant', `invalid ${what} ${hex(b)}`, offset,
    {actual: b, expected})
}

export function readValType(c :Cursor) :ValType {
  const start = c.pos
  const b = c.u8()
  const t = valtypes.get(b)
  if (t === undefined) {
    throw unexpected('value type', b, start, 'i32, i64, f32, f64, v128, funcref or externref')
  }
  return t
}

export function readRefType(c :Cursor) :RefType {
  const start = c.pos
  const b = c.u8()
  const t = reftypes.get(b)
  if (t === undefined) {
    throw unexpected('reference type', b, start, 'funcref (0x70) or externref (0x6f)')
  }
  return t
}

export function readLimits(c :Cursor) :Limits {
  const start = c.pos
  const flag = c.u8()
  switch (flag) {
    case 0x00: return { min: c.u32() }
    case 0x01: return { min: c.u32(), max: c.u32() }
    default:
      throw unexpected('limits flag', flag, start, '0x00 or 0x01')
  }
}

export function readFuncType(c :Cursor) :FuncType {
  const start = c.pos
  const form = c.u8()
  if (form != 0x60) {
    throw unexpected('function type form', form, start, '0x60')
  }
  const params = c.vec(readValType)
  const results = c.vec(readValType)
  return { params, results }
}

export function readTableType(c :Cursor) :TableType {
  const elem = readRefType(c)
  return { elem, limits: readLimits(c) }
}

export const readMemType :(c :Cursor) => MemType = readLimits

export function readGlobalType(c :Cursor) :GlobalType {
  const type = readValType(c)
  const start = c.pos
  const m = c.u8()
  if (m > 1) {
    throw unexpected('global mutability', m, start, '0x00 (const) or 0x01 (var)')
  }
  return { type, mutable: m == 1 }
}
