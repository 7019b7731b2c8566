// UTF-8 encoding/decoding
export interface UTF8 {
  encode(text :string) :Uint8Array
  // Throws a TypeError on malformed input instead of substituting U+FFFD
  decodeStrict(buf :Uint8Array) :string
}

const enc = new TextEncoder()
const fatal = new TextDecoder('utf-8', {fatal: true})

export const utf8 :UTF8 = {

  encode(text :string) :Uint8Array {
    return enc.encode(text)
  },

  decodeStrict(b :Uint8Array) :string {
    return fatal.decode(b)
  },

}
