export type uint7   = number
export type uint8   = number
export type uint16  = number
export type uint32  = number
export type int32   = number
export type int33   = number
export type int64   = bigint
export type float32 = number
export type float64 = number
