import type { uint8, uint32, int32, int33, int64, float32, float64 } from './basic-types'
import { DecodeError, hex } from './errors'
import { utf8 } from './utf8'

export interface CursorOptions {
  readonly strict   :boolean  // reject non-canonical integers and reserved bytes
  readonly maxDepth :number   // deepest permitted block nesting
}

export const defaultCursorOptions :CursorOptions = {
  strict:   true,
  maxDepth: 1024,
}

// Fills in defaults field by field; a field given as undefined takes the
// default too. Throws a RangeError for a maxDepth that is not a
// non-negative integer.
export function resolveCursorOptions(options? :Partial<CursorOptions>) :CursorOptions {
  const o :Partial<CursorOptions> = options || {}
  const strict = o.strict !== undefined ? o.strict : defaultCursorOptions.strict
  const maxDepth = o.maxDepth !== undefined ? o.maxDepth : defaultCursorOptions.maxDepth
  if (!Number.isInteger(maxDepth) || maxDepth < 0) {
    throw new RangeError(`maxDepth must be a non-negative integer, got ${maxDepth}`)
  }
  return { strict, maxDepth }
}

// Cursor is a read position over a byte sequence. Every decode function
// takes the cursor it reads from and leaves it positioned right after the
// bytes it consumed.
//
// A cursor may be a frame: a window over part of its parent's bytes whose
// length was declared by the input (a section or a function body). Reading
// past the end of a frame is a size mismatch rather than end-of-input.
export class Cursor {
  readonly buf     :Uint8Array
  readonly end     :uint32
  readonly frameOf :string|null  // label of the framed region, if any
  readonly options :CursorOptions
           pos     :uint32

  constructor(
    buf      :Uint8Array,
    options? :Partial<CursorOptions>,
    pos      :uint32 = 0,
    end      :uint32 = buf.length,
    frameOf  :string|null = null)
  {
    this.buf = buf
    this.options = resolveCursorOptions(options)
    this.pos = pos
    this.end = end
    this.frameOf = frameOf
  }

  get strict() :boolean { return this.options.strict }
  get remaining() :uint32 { return this.end - this.pos }
  get eof() :boolean { return this.pos >= this.end }

  // Fails unless n more bytes are available
  private need(n :number, start :uint32 = this.pos) {
    if (this.pos + n <= this.end) {
      return
    }
    if (this.frameOf !== null) {
      throw new DecodeError('section-size-mismatch',
        `${this.frameOf} ends before its content (${this.pos + n - this.end} byte(s) short)`,
        start, {end: this.end, expected: `${n} more byte(s)`})
    }
    throw new DecodeError('end-of-input',
      `unexpected end of input: needed ${n} byte(s), ${this.remaining} left`,
      start, {end: this.end})
  }

  peek() :uint8 {
    this.need(1)
    return this.buf[this.pos]
  }

  u8() :uint8 {
    this.need(1)
    return this.buf[this.pos++]
  }

  // Returns a copy of the next n bytes
  take(n :number) :Uint8Array {
    this.need(n)
    const b = this.buf.slice(this.pos, this.pos + n)
    this.pos += n
    return b
  }

  // Returns a copy of all bytes up to the end of this cursor
  rest() :Uint8Array {
    return this.take(this.remaining)
  }

  u32le() :uint32 {
    this.need(4)
    const p = this.pos
    this.pos += 4
    return (this.buf[p] | (this.buf[p+1] << 8) | (this.buf[p+2] << 16) | (this.buf[p+3] << 24)) >>> 0
  }

  f32() :float32 {
    this.need(4)
    const v = new DataView(this.buf.buffer, this.buf.byteOffset + this.pos, 4).getFloat32(0, true)
    this.pos += 4
    return v
  }

  f64() :float64 {
    this.need(8)
    const v = new DataView(this.buf.buffer, this.buf.byteOffset + this.pos, 8).getFloat64(0, true)
    this.pos += 8
    return v
  }

  //——————————————————————————————————————————————————————————————————————————
  // LEB128-encoded variable-length integers: (N = bits)
  //   unsigned range: [0, 2^N-1]
  //   signed range:   [-2^(N-1), +2^(N-1)-1]
  // An N-bit integer occupies at most ceil(N/7) bytes.

  readUnsigned(bits :number) :bigint {
    const start = this.pos
    const maxBytes = Math.ceil(bits / 7)
    let result = 0n
    let shift = 0n
    for (let i = 0; ; ++i) {
      const b = this.u8()
      if (i == maxBytes - 1) {
        if (b & 0x80) {
          throw this.malformed('integer representation too long', start, bits)
        }
        if (this.strict && b >= 1 << (bits - 7 * i)) {
          throw this.malformed('integer too large', start, bits)
        }
      }
      result |= BigInt(b & 0x7f) << shift
      if ((b & 0x80) == 0) {
        return this.strict ? result : BigInt.asUintN(bits, result)
      }
      shift += 7n
    }
  }

  readSigned(bits :number) :bigint {
    const start = this.pos
    const maxBytes = Math.ceil(bits / 7)
    let result = 0n
    let shift = 0n
    for (let i = 0; ; ++i) {
      const b = this.u8()
      if (i == maxBytes - 1) {
        if (b & 0x80) {
          throw this.malformed('integer representation too long', start, bits)
        }
        // the sign bit and every unused bit above it must agree
        const used = bits - 7 * i
        const high = (b & 0x7f) >> (used - 1)
        if (this.strict && high != 0 && high != (0x7f >> (used - 1))) {
          throw this.malformed('integer too large', start, bits)
        }
      }
      result |= BigInt(b & 0x7f) << shift
      shift += 7n
      if ((b & 0x80) == 0) {
        if (b & 0x40) {
          result -= 1n << shift
        }
        return this.strict ? result : BigInt.asIntN(bits, result)
      }
    }
  }

  u32() :uint32 { return Number(this.readUnsigned(32)) }
  s32() :int32  { return Number(this.readSigned(32)) }
  s33() :int33  { return Number(this.readSigned(33)) }
  s64() :int64  { return this.readSigned(64) }

  private malformed(msg :string, start :uint32, bits :number) {
    return new DecodeError('malformed-integer', `${msg} (${bits}-bit LEB128)`, start,
      {end: this.pos, expected: `at most ${Math.ceil(bits / 7)} byte(s)`})
  }

  //——————————————————————————————————————————————————————————————————————————
  // Composite reads

  // Length-prefixed byte sequence
  bytes() :Uint8Array {
    return this.take(this.u32())
  }

  // Length-prefixed UTF-8 text
  name() :string {
    const start = this.pos
    const b = this.bytes()
    try {
      return utf8.decodeStrict(b)
    } catch (err) {
      throw new DecodeError('malformed-utf8', 'name is not valid UTF-8', start, {end: this.pos})
    }
  }

  // Count-prefixed sequence of T
  vec<T>(read :(c :Cursor) => T) :T[] {
    const count = this.u32()
    const v :T[] = []
    for (let i = 0; i < count; ++i) {
      v.push(read(this))
    }
    return v
  }

  // Reads a reserved byte which must be zero
  zero(what :string) {
    const start = this.pos
    const b = this.u8()
    if (b != 0 && this.strict) {
      throw new DecodeError('invalid-discriminant', `${what}: reserved byte must be 0x00, got ${hex(b)}`,
        start, {actual: b, expected: '0x00'})
    }
  }

  //——————————————————————————————————————————————————————————————————————————
  // Frames

  // Consumes the next `size` bytes and returns a cursor over just them
  frame(size :uint32, label :string) :Cursor {
    this.need(size)
    const c = new Cursor(this.buf, this.options, this.pos, this.pos + size, label)
    this.pos += size
    return c
  }

  // Fails if a frame was not read to its end
  expectEnd() {
    if (this.pos != this.end) {
      throw new DecodeError('section-size-mismatch',
        `${this.frameOf || 'input'} has ${this.remaining} byte(s) left after its content`,
        this.pos, {end: this.end, actual: this.remaining, expected: '0 bytes left'})
    }
  }
}
