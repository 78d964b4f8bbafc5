export {
  type Bridge,
  type BridgeEntry,
  type BridgeMode,
  type BridgeSpec,
  createBridge,
} from "./bridge"
export { Document, type DocumentChange, type DocumentOptions } from "./Document"
export {
  FragmentDocError,
  NoDefaultError,
  NoSuchElementError,
  OrphanedFragmentError,
  SchemaError,
  TypeMismatchError,
  UnsupportedOperationError,
  ValidationError,
} from "./error"
export { Fragment, type FragmentClass, type FragmentInit } from "./Fragment"
export type { Item, JSONContainer, JSONPrimitive, JSONRecord, JSONValue, Path } from "./json"
export { formatPath, formatSchemaPath, formatValuePath } from "./path"
export { type SchemaNode, SchemaView, type TypeTag } from "./SchemaView"
export { type ValidateFn, validateValue } from "./validator"
