import { Writable } from "node:stream"
import { PinoLogger } from "@bindery/logger"
import { CommanderFlagRegistry } from "../../adapters/commander/commander-flag-registry"

export type CapturedFlags = {
  flags: CommanderFlagRegistry
  /** Chunks written to the registry's error stream */
  err: string[]
  out: string[]
}

export function captureFlags(): CapturedFlags {
  const err: string[] = []
  const out: string[] = []

  const flags = new CommanderFlagRegistry({
    programName: "svc",
    writeErr: (text) => {
      err.push(text)
    },
    writeOut: (text) => {
      out.push(text)
    },
  })

  return { flags, err, out }
}

export function captureLogs(): { logger: PinoLogger; lines: Record<string, unknown>[] } {
  const lines: Record<string, unknown>[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const payload: Record<string, unknown> = JSON.parse(chunk.toString())
      lines.push(payload)
      callback()
    },
  })

  return { logger: new PinoLogger({ destination }, { level: "trace" }), lines }
}

/** Runs `act` once and returns what it threw. */
export function thrownBy(act: () => unknown): unknown {
  try {
    act()
  } catch (err) {
    return err
  }

  throw new Error("expected the call to throw")
}
