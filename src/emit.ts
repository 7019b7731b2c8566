import type { uint8, uint16, uint32, float32, float64 } from './basic-types'

export interface Emitter {
  // Emits code
  //
  // Each modifying operation returns the Emitter so calls can be chained:
  //   e.writeU8(0x41).writeVarInt(-1)
  //
  writeU8(v :uint8) :Emitter
  writeU16(v :uint16) :Emitter
  writeU32(v :uint32) :Emitter
  writeF32(v :float32) :Emitter
  writeF64(v :float64) :Emitter
  writeBytes(v :ArrayLike<uint8>) :Emitter
  writeVarUint(v :number|bigint) :Emitter
  writeVarInt(v :number|bigint) :Emitter
}

//——————————————————————————————————————————————————————————————————————————————
// LEB128 encoders. These are the inverse of Cursor.readUnsigned and
// Cursor.readSigned: for every x representable in `bits`,
// decoding encodeX(x) at the same width yields x.

function checkRange(v :bigint, min :bigint, max :bigint, bits :number) {
  if (v < min || v > max) {
    throw new RangeError(`${v} is not representable in ${bits} bits`)
  }
}

export function encodeUnsigned(value :number|bigint, bits :number = 64) :uint8[] {
  let v = BigInt(value)
  checkRange(v, 0n, (1n << BigInt(bits)) - 1n, bits)
  const bytes :uint8[] = []
  do {
    let b = Number(v & 0x7fn)
    v >>= 7n
    if (v != 0n) {
      b |= 0x80
    }
    bytes.push(b)
  } while (v != 0n)
  return bytes
}

export function encodeSigned(value :number|bigint, bits :number = 64) :uint8[] {
  let v = BigInt(value)
  const half = 1n << BigInt(bits - 1)
  checkRange(v, -half, half - 1n, bits)
  const bytes :uint8[] = []
  while (true) {
    const b = Number(v & 0x7fn)
    v >>= 7n // Note: sign-propagating right shift
    if ((v == 0n && (b & 0x40) == 0) || (v == -1n && (b & 0x40) != 0)) {
      bytes.push(b)
      return bytes
    }
    bytes.push(b | 0x80)
  }
}

//——————————————————————————————————————————————————————————————————————————————

// Emitter that writes to a growable buffer
export class BufferedEmitter implements Emitter {
  private buf  :Uint8Array
  private view :DataView
          length :uint32

  constructor(initialCapacity :number = 256) {
    this.buf    = new Uint8Array(Math.max(initialCapacity, 8))
    this.view   = new DataView(this.buf.buffer)
    this.length = 0
  }

  private reserve(n :number) {
    if (this.length + n <= this.buf.length) {
      return
    }
    let cap = this.buf.length
    while (cap < this.length + n) {
      cap *= 2
    }
    const b = new Uint8Array(cap)
    b.set(this.buf.subarray(0, this.length))
    this.buf = b
    this.view = new DataView(b.buffer)
  }

  writeU8(v :uint8) :Emitter {
    this.reserve(1)
    this.view.setUint8(this.length++, v)
    return this
  }

  writeU16(v :uint16) :Emitter {
    this.reserve(2)
    this.view.setUint16(this.length, v, true)
    this.length += 2
    return this
  }

  writeU32(v :uint32) :Emitter {
    this.reserve(4)
    this.view.setUint32(this.length, v, true)
    this.length += 4
    return this
  }

  writeF32(v :float32) :Emitter {
    this.reserve(4)
    this.view.setFloat32(this.length, v, true)
    this.length += 4
    return this
  }

  writeF64(v :float64) :Emitter {
    this.reserve(8)
    this.view.setFloat64(this.length, v, true)
    this.length += 8
    return this
  }

  writeBytes(bytes :ArrayLike<uint8>) :Emitter {
    this.reserve(bytes.length)
    for (let i = 0, L = bytes.length; i != L; ++i) {
      this.buf[this.length++] = bytes[i]
    }
    return this
  }

  writeVarUint(v :number|bigint) :Emitter {
    return this.writeBytes(encodeUnsigned(v))
  }

  writeVarInt(v :number|bigint) :Emitter {
    return this.writeBytes(encodeSigned(v))
  }

  // Copy of everything written so far
  bytes() :Uint8Array {
    return this.buf.slice(0, this.length)
  }
}

// Note: you can use repr.reprBuffer(emitter.bytes(), writer)
// to print an ASCII representation of a buffer.
