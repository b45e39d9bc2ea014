export {
  CommanderFlagRegistry,
  type CommanderFlagRegistryOptions,
} from "./adapters/commander/commander-flag-registry"
export { RecordEnvStore } from "./adapters/env/record-env-store"
export { NodeFileTree } from "./adapters/fs/node-file-tree"
export { type BindOptions, bind, parse } from "./core/bind"
export {
  type ConfigDirectoryKeys,
  type ConfigDirectoryOptions,
  resolveConfigDirectory,
} from "./core/config-directory"
export type { EnvInput } from "./core/env-input"
export {
  BindError,
  type BindErrorCode,
  CoercionError,
  FlagParseError,
  InvalidArgumentError,
  MandatoryMissingError,
  type MissingField,
  SourceReadError,
} from "./core/errors"
export {
  boolean,
  defineFields,
  type FieldKind,
  type FieldOptions,
  type FieldSchema,
  FieldSpec,
  type FieldValue,
  type InferFields,
  integer,
  text,
  zeroValue,
} from "./core/fields"
export type { ValueSource } from "./core/value-source"
export type { IBindReport } from "./ports/bind-report"
export type { EnvStore } from "./ports/env-store"
export type { FileTree } from "./ports/file-tree"
export type { FlagDefinition, FlagRegistry } from "./ports/flag-registry"
