import { BaseError } from "@bindery/errors"
import { SOURCE_LABELS, type ValueSource } from "./value-source"

export type BindErrorCode =
  | "invalid_argument"
  | "coercion_failed"
  | "source_read_failed"
  | "flag_parse_failed"
  | "mandatory_missing"

export type MissingField = Readonly<{
  field: string
  flagKey: string
  envKey: string
}>

export class BindError<C extends BindErrorCode = BindErrorCode> extends BaseError<C> {}

export class InvalidArgumentError extends BindError<"invalid_argument"> {
  static notAnObject(received: string): InvalidArgumentError {
    return new InvalidArgumentError(
      `argument must be an object record - got ${received} instead`,
      { code: "invalid_argument", context: { received }, isOperational: false },
    )
  }

  static fieldOptions(kind: string, details: string): InvalidArgumentError {
    return new InvalidArgumentError(`invalid ${kind} field options:\n${details}`, {
      code: "invalid_argument",
      context: { kind },
      isOperational: false,
    })
  }

  static duplicateFlag(flagKey: string, fields: readonly string[]): InvalidArgumentError {
    return new InvalidArgumentError(
      `flag -${flagKey} is declared by more than one field: ${fields.join(", ")}`,
      { code: "invalid_argument", context: { flagKey, fields }, isOperational: false },
    )
  }

  static flagRegistered(flagKey: string): InvalidArgumentError {
    return new InvalidArgumentError(
      `flag -${flagKey} is already registered; use a fresh registry for every bind`,
      { code: "invalid_argument", context: { flagKey }, isOperational: false },
    )
  }

  static notWritable(field: string): InvalidArgumentError {
    return new InvalidArgumentError(`field ${field} rejected the assignment`, {
      code: "invalid_argument",
      context: { field },
      isOperational: false,
    })
  }
}

export class CoercionError extends BindError<"coercion_failed"> {
  static notAnInteger(input: { source: ValueSource; key: string; raw: string }): CoercionError {
    return new CoercionError(
      `${SOURCE_LABELS[input.source]} ${input.key} must be an integer - instead it is: ${input.raw}`,
      {
        code: "coercion_failed",
        context: { source: input.source, key: input.key, raw: input.raw },
      },
    )
  }
}

export class SourceReadError extends BindError<"source_read_failed"> {
  static unreadable(filePath: string, cause: unknown): SourceReadError {
    return new SourceReadError(`cannot read configuration file ${filePath}`, {
      code: "source_read_failed",
      context: { path: filePath },
      cause,
    })
  }

  static untraversable(directory: string, cause: unknown): SourceReadError {
    return new SourceReadError(`error traversing config directory ${directory}`, {
      code: "source_read_failed",
      context: { directory },
      cause,
    })
  }
}

export class FlagParseError extends BindError<"flag_parse_failed"> {
  static invalid(message: string, cause: unknown): FlagParseError {
    return new FlagParseError(message, {
      code: "flag_parse_failed",
      context: { reason: "invalid" },
      cause,
    })
  }

  static helpRequested(): FlagParseError {
    return new FlagParseError("help requested", {
      code: "flag_parse_failed",
      context: { reason: "help" },
    })
  }
}

export class MandatoryMissingError extends BindError<"mandatory_missing"> {
  static of(missing: readonly MissingField[]): MandatoryMissingError {
    return new MandatoryMissingError(`${missing.length} mandatory parameters missing`, {
      code: "mandatory_missing",
      context: { count: missing.length, missing: missing.map((m) => ({ ...m })) },
    })
  }
}
