export * from './basic-types'
export * from './ast'
export { DecodeError, type DecodeErrorKind, type DecodeErrorDetail } from './errors'
export { Cursor, type CursorOptions, defaultCursorOptions, resolveCursorOptions } from './cursor'
export { type Emitter, BufferedEmitter, encodeUnsigned, encodeSigned } from './emit'
export { opcodeEntries, type OpcodeEntry, type Shape } from './info'
export { readInstr, readExpr, readBlockType, readMemArg } from './instr'
export {
  readValType, readRefType, readLimits, readFuncType, readTableType, readMemType, readGlobalType,
} from './types'
export { decode, readSection, type DecodeOptions, MAGIC, VERSION } from './module'
export { printCode } from './lbtext'
export { repr, strRepr, reprBuffer, strReprBuffer, BufferedWriter, type Writer, type Options } from './repr'
export { utf8, type UTF8 } from './utf8'
