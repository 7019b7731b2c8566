// Decoded module tree.
//
// Every node is built once, bottom-up, by the decoder and exposed through
// readonly types. Instructions own their nested sequences; nothing points
// back up the tree.
//
import type { uint7, uint8, uint32, int32, int64, float32, float64 } from './basic-types'
import type {
  PlainOp, BlockOp, LabelOp, FuncOp, LocalOp, GlobalOp, TableOp,
  MemOp, MemoryOp, LaneOp, MemLaneOp,
} from './info'

//——————————————————————————————————————————————————————————————————————————————
// Types

export type NumType = 'i32' | 'i64' | 'f32' | 'f64'
export type VecType = 'v128'
export type RefType = 'funcref' | 'externref'
export type ValType = NumType | VecType | RefType

export interface FuncType {
  readonly params  :ValType[]
  readonly results :ValType[]
}

export interface Limits {
  readonly min  :uint32
  readonly max? :uint32
}

export interface TableType {
  readonly elem   :RefType
  readonly limits :Limits
}

export type MemType = Limits

export interface GlobalType {
  readonly type    :ValType
  readonly mutable :boolean
}

export type BlockType = { readonly kind :'empty' }
                      | { readonly kind :'value', readonly type :ValType }
                      | { readonly kind :'index', readonly index :uint32 }

export interface MemArg {
  readonly align  :uint32  // log2 of the alignment
  readonly offset :uint32
}

//——————————————————————————————————————————————————————————————————————————————
// Instructions

export interface PlainInstr   { readonly op :PlainOp }
export interface BlockInstr   { readonly op :BlockOp, readonly type :BlockType, readonly body :Instr[] }
export interface IfInstr      { readonly op :'if', readonly type :BlockType, readonly then_ :Instr[] }
export interface IfElseInstr  { readonly op :'if_else', readonly type :BlockType,
                                readonly then_ :Instr[], readonly else_ :Instr[] }
export interface LabelInstr   { readonly op :LabelOp, readonly label :uint32 }
export interface BrTableInstr { readonly op :'br_table', readonly labels :uint32[],
                                readonly defaultLabel :uint32 }
export interface FuncInstr    { readonly op :FuncOp, readonly func :uint32 }
export interface CallIndirectInstr { readonly op :'call_indirect', readonly type :uint32,
                                     readonly table :uint32 }
export interface RefNullInstr { readonly op :'ref.null', readonly type :RefType }
export interface SelectTInstr { readonly op :'select_t', readonly types :ValType[] }
export interface LocalInstr   { readonly op :LocalOp, readonly local :uint32 }
export interface GlobalInstr  { readonly op :GlobalOp, readonly global :uint32 }
export interface TableInstr   { readonly op :TableOp, readonly table :uint32 }
export interface TableInitInstr { readonly op :'table.init', readonly elem :uint32, readonly table :uint32 }
export interface ElemDropInstr  { readonly op :'elem.drop', readonly elem :uint32 }
export interface TableCopyInstr { readonly op :'table.copy', readonly dst :uint32, readonly src :uint32 }
export interface MemoryInstr  { readonly op :MemoryOp | 'memory.copy' }
export interface MemoryInitInstr { readonly op :'memory.init', readonly data :uint32 }
export interface DataDropInstr   { readonly op :'data.drop', readonly data :uint32 }
export interface MemInstr     { readonly op :MemOp, readonly memarg :MemArg }
export interface I32Const     { readonly op :'i32.const', readonly value :int32 }
export interface I64Const     { readonly op :'i64.const', readonly value :int64 }
export interface F32Const     { readonly op :'f32.const', readonly value :float32 }
export interface F64Const     { readonly op :'f64.const', readonly value :float64 }
export interface V128Const    { readonly op :'v128.const', readonly bytes :Uint8Array }
export interface ShuffleInstr { readonly op :'i8x16.shuffle', readonly lanes :uint8[] }
export interface LaneInstr    { readonly op :LaneOp, readonly lane :uint8 }
export interface MemLaneInstr { readonly op :MemLaneOp, readonly memarg :MemArg, readonly lane :uint8 }

export type Instr = PlainInstr
                  | BlockInstr
                  | IfInstr
                  | IfElseInstr
                  | LabelInstr
                  | BrTableInstr
                  | FuncInstr
                  | CallIndirectInstr
                  | RefNullInstr
                  | SelectTInstr
                  | LocalInstr
                  | GlobalInstr
                  | TableInstr
                  | TableInitInstr
                  | ElemDropInstr
                  | TableCopyInstr
                  | MemoryInstr
                  | MemoryInitInstr
                  | DataDropInstr
                  | MemInstr
                  | I32Const
                  | I64Const
                  | F32Const
                  | F64Const
                  | V128Const
                  | ShuffleInstr
                  | LaneInstr
                  | MemLaneInstr

// Constant expression, e.g. a global initializer or a segment offset
export type Expr = Instr[]

//——————————————————————————————————————————————————————————————————————————————
// Section payloads

export type ImportDesc = { readonly kind :'func', readonly type :uint32 }
                       | { readonly kind :'table', readonly table :TableType }
                       | { readonly kind :'memory', readonly memory :MemType }
                       | { readonly kind :'global', readonly global :GlobalType }

export interface Import {
  readonly module :string
  readonly name   :string
  readonly desc   :ImportDesc
}

export type ExternalKind = 'func' | 'table' | 'memory' | 'global'

export interface Export {
  readonly name :string
  readonly desc :{ readonly kind :ExternalKind, readonly index :uint32 }
}

export interface Global {
  readonly type :GlobalType
  readonly init :Expr
}

export type ElemMode = { readonly kind :'active', readonly table :uint32, readonly offset :Expr }
                     | { readonly kind :'passive' }
                     | { readonly kind :'declarative' }

export type ElemInit = { readonly kind :'funcs', readonly funcs :uint32[] }
                     | { readonly kind :'exprs', readonly exprs :Expr[] }

export interface ElemSegment {
  readonly flags :uint32  // binary form, 0-7
  readonly mode  :ElemMode
  readonly type  :RefType
  readonly init  :ElemInit
}

export type DataMode = { readonly kind :'active', readonly memory :uint32, readonly offset :Expr }
                     | { readonly kind :'passive' }

export interface DataSegment {
  readonly mode :DataMode
  readonly init :Uint8Array
}

export interface Locals {
  readonly count :uint32
  readonly type  :ValType
}

export interface FunctionBody {
  readonly size   :uint32  // declared byte length of locals and code
  readonly locals :Locals[]
  readonly code   :Expr
}

//——————————————————————————————————————————————————————————————————————————————
// Sections

export interface CustomSection    { readonly kind :'custom', readonly name :string, readonly bytes :Uint8Array }
export interface TypeSection      { readonly kind :'type', readonly types :FuncType[] }
export interface ImportSection    { readonly kind :'import', readonly imports :Import[] }
export interface FunctionSection  { readonly kind :'function', readonly types :uint32[] }
export interface TableSection     { readonly kind :'table', readonly tables :TableType[] }
export interface MemorySection    { readonly kind :'memory', readonly memories :MemType[] }
export interface GlobalSection    { readonly kind :'global', readonly globals :Global[] }
export interface ExportSection    { readonly kind :'export', readonly exports :Export[] }
export interface StartSection     { readonly kind :'start', readonly func :uint32 }
export interface ElementSection   { readonly kind :'element', readonly segments :ElemSegment[] }
export interface CodeSection      { readonly kind :'code', readonly bodies :FunctionBody[] }
export interface DataSection      { readonly kind :'data', readonly segments :DataSegment[] }
export interface DataCountSection { readonly kind :'data_count', readonly count :uint32 }
export interface UnknownSection   { readonly kind :'unknown', readonly id :uint8, readonly bytes :Uint8Array }

export type Section = CustomSection
                    | TypeSection
                    | ImportSection
                    | FunctionSection
                    | TableSection
                    | MemorySection
                    | GlobalSection
                    | ExportSection
                    | StartSection
                    | ElementSection
                    | CodeSection
                    | DataSection
                    | DataCountSection
                    | UnknownSection

export type SectionKind = Section['kind']

export interface Module {
  readonly magic    :uint32
  readonly version  :uint32
  readonly sections :Section[]
}

export const sect_id = {
  custom:     0,
  type:       1,
  import:     2,
  function:   3,
  table:      4,
  memory:     5,
  global:     6,
  export:     7,
  start:      8,
  element:    9,
  code:       10,
  data:       11,
  data_count: 12,
} as const

export type KnownSectionKind = keyof typeof sect_id

// Maps a section id to its kind; ids without an entry decode as 'unknown'
export const sectionKinds = new Map<uint7, KnownSectionKind>()
for (const kind of Object.keys(sect_id)) {
  if (isKnownKind(kind)) {
    sectionKinds.set(sect_id[kind], kind)
  }
}

function isKnownKind(s :string) :s is KnownSectionKind {
  return s in sect_id
}

//——————————————————————————————————————————————————————————————————————————————
// Access helpers

export interface FunctionBodyInfo {
  readonly index  :uint32      // function index, counting imported functions
  readonly type   :uint32|null // type index from the function section, if any
  readonly size   :uint32
  readonly locals :Locals[]
  readonly code   :Expr
}

const isKind = <K extends SectionKind>(kind :K) =>
  (s :Section) :s is Extract<Section, { kind :K }> => s.kind == kind

export const get = {
  sections(m :Module) :Section[] {
    return m.sections
  },

  // First section of the given kind
  section<K extends SectionKind>(m :Module, kind :K) :Extract<Section, { kind :K }> | undefined {
    return m.sections.find(isKind(kind))
  },

  function_bodies(m :Module) :Iterable<FunctionBodyInfo> {
    const code = get.section(m, 'code')
    const funcs = get.section(m, 'function')
    const imports = get.section(m, 'import')
    const base = imports ? imports.imports.filter(i => i.desc.kind == 'func').length : 0
    return {
      *[Symbol.iterator]() {
        if (!code) {
          return
        }
        for (let i = 0; i < code.bodies.length; ++i) {
          const body = code.bodies[i]
          yield {
            index:  base + i,
            type:   funcs && i < funcs.types.length ? funcs.types[i] : null,
            size:   body.size,
            locals: body.locals,
            code:   body.code,
          }
        }
      }
    }
  },
}
