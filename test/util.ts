// Helpers for building module bytes in tests
import { BufferedEmitter, encodeUnsigned, encodeSigned } from '../src/emit'
import { DecodeError } from '../src/errors'
import { utf8 } from '../src/utf8'

export type Bytes = number[]

export const u32 = (v :number) :Bytes => encodeUnsigned(v, 32)
export const s32 = (v :number) :Bytes => encodeSigned(v, 32)
export const s64 = (v :bigint) :Bytes => encodeSigned(v, 64)

export const preamble :Bytes = [0x00, 0x61, 0x73, 0x6d, 0x01, 0x00, 0x00, 0x00]

export function f32(v :number) :Bytes {
  return Array.from(emitted(e => e.writeF32(v)))
}

export function f64(v :number) :Bytes {
  return Array.from(emitted(e => e.writeF64(v)))
}

function emitted(fn :(e :BufferedEmitter) => void) :Uint8Array {
  const e = new BufferedEmitter()
  fn(e)
  return e.bytes()
}

export function str(s :string) :Bytes {
  const b = utf8.encode(s)
  return [...u32(b.length), ...b]
}

// Count-prefixed concatenation of items
export function vec(items :Bytes[]) :Bytes {
  return [...u32(items.length), ...items.flat()]
}

export function section(id :number, payload :Bytes) :Bytes {
  return [id, ...u32(payload.length), ...payload]
}

// Code section entry: size, locals, then code (which must include its
// terminating 0x0b)
export function body(locals :Bytes[], code :Bytes) :Bytes {
  const b = [...vec(locals), ...code]
  return [...u32(b.length), ...b]
}

export function module(...sections :Bytes[]) :Uint8Array {
  const e = new BufferedEmitter()
  e.writeBytes(preamble)
  for (const s of sections) {
    e.writeBytes(s)
  }
  return e.bytes()
}

// Runs fn and returns the DecodeError it throws
export function decodeError(fn :() => unknown) :DecodeError {
  try {
    fn()
  } catch (err) {
    if (err instanceof DecodeError) {
      return err
    }
    throw err
  }
  throw new Error('expected a DecodeError')
}
