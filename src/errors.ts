import type { uint32 } from './basic-types'

export type DecodeErrorKind = 'malformed-integer'        // overlong or too-large LEB128
                            | 'end-of-input'             // read past the available bytes
                            | 'invalid-discriminant'     // unknown type/kind/flag byte
                            | 'invalid-opcode'           // unmapped opcode or sub-opcode
                            | 'invalid-preamble'         // bad magic or unsupported version
                            | 'section-size-mismatch'    // framed payload under- or overrun
                            | 'recursion-depth-exceeded' // blocks nested deeper than maxDepth
                            | 'malformed-utf8'           // name is not valid UTF-8

export interface DecodeErrorDetail {
  readonly end?      :uint32  // end of the offending byte range (exclusive)
  readonly actual?   :number  // observed byte or value
  readonly expected? :string
}

// Thrown by every decode step. `byteRange` can be passed straight to
// repr.reprBuffer to highlight the offending bytes.
export class DecodeError extends Error {
  readonly kind      :DecodeErrorKind
  readonly offset    :uint32
  readonly byteRange :[uint32, uint32]
  readonly actual?   :number
  readonly expected? :string

  constructor(kind :DecodeErrorKind, message :string, offset :uint32, detail? :DecodeErrorDetail) {
    super(`${message} at offset 0x${offset.toString(16)}`)
    this.name = 'DecodeError'
    this.kind = kind
    this.offset = offset
    this.byteRange = [offset, detail && detail.end !== undefined ? detail.end : offset + 1]
    if (detail) {
      this.actual = detail.actual
      this.expected = detail.expected
    }
  }
}

export const hex = (v :number) => '0x' + (v < 16 ? '0' : '') + v.toString(16)
