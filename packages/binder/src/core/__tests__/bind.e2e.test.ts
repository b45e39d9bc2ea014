import fs from "node:fs"
import os from "node:os"
import path from "node:path"
import { bind } from "../bind"
import { resolveConfigDirectory } from "../config-directory"
import { boolean, defineFields, integer, text } from "../fields"
import { captureFlags } from "./bind-harness"

const appFields = defineFields({
  hostname: text({ env: "HOST", flag: "host", mandatory: true }),
  port: integer({ default: "8080" }),
  maxRetries: integer(),
  dbPassword: text({ file: "db-password", env: "DB_PASSWORD" }),
  debug: boolean(),
})

const blankApp = () => ({ hostname: "", port: 0, maxRetries: 0, dbPassword: "", debug: false })

describe("bind against a configuration directory", () => {
  let root: string

  const write = (relative: string, contents: string) => {
    const filePath = path.join(root, relative)
    fs.mkdirSync(path.dirname(filePath), { recursive: true })
    fs.writeFileSync(filePath, contents)
    return filePath
  }

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "bindery-"))
  })

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true })
  })

  it("finds files at any depth", () => {
    const { flags } = captureFlags()
    const hostnamePath = write("a/b/hostname", "files.example")
    write("c/maxretries", "5")
    write("secrets/db-password", "test-secret")
    const config = blankApp()

    const report = bind(config, appFields, { directory: root, argv: [], env: {}, flags })

    expect(config).toEqual({
      hostname: "files.example",
      port: 8080,
      maxRetries: 5,
      dbPassword: "test-secret",
      debug: false,
    })
    expect(report.explain("hostname")).toBe(`file:${hostnamePath}`)
    expect(report.sourcesUsed()).toEqual(["file", "default"])
  })

  it("ranks files over environment variables over flags", () => {
    const { flags } = captureFlags()
    write("port", "9000")
    const config = blankApp()

    bind(config, appFields, {
      directory: root,
      argv: ["-host", "from-flag", "-port", "8000", "-maxretries", "1"],
      env: { HOST: "from-env", PORT: "7000" },
      flags,
    })

    expect(config.port).toBe(9000)
    expect(config.hostname).toBe("from-env")
    expect(config.maxRetries).toBe(1)
  })

  it("keeps the trailing newline of a text file", () => {
    const { flags } = captureFlags()
    write("hostname", "files.example\n")
    const config = blankApp()

    bind(config, appFields, { directory: root, argv: [], env: {}, flags })

    expect(config.hostname).toBe("files.example\n")
  })

  it("uses the first file in walk order when names repeat", () => {
    const { flags } = captureFlags()
    write("b/hostname", "second")
    write("a/hostname", "first")
    const config = blankApp()

    bind(config, appFields, { directory: root, argv: [], env: {}, flags })

    expect(config.hostname).toBe("first")
  })

  it("ignores a directory named like a field", () => {
    const { flags } = captureFlags()
    write("hostname/readme", "not a value")
    const config = blankApp()

    bind(config, appFields, { directory: root, argv: ["-host", "abc"], env: {}, flags })

    expect(config.hostname).toBe("abc")
  })

  it("treats a missing directory as empty", () => {
    const { flags } = captureFlags()
    const config = blankApp()

    bind(config, appFields, {
      directory: path.join(root, "absent"),
      argv: [],
      env: { HOST: "from-env" },
      flags,
    })

    expect(config.hostname).toBe("from-env")
  })

  it("binds from the directory named by the config flag", () => {
    const nested = path.join(root, "etc")
    write("etc/hostname", "conf.example")
    const argv = ["-configdir", nested, "-debug"]
    const directory = resolveConfigDirectory(
      { envKey: "CONFIGDIR", flagKey: "configdir", fallback: "/config" },
      { argv, env: {} },
    )
    const { flags } = captureFlags()
    const config = blankApp()

    bind(config, appFields, { directory, argv, env: {}, flags })

    expect(directory).toBe(nested)
    expect(config.hostname).toBe("conf.example")
    expect(config.debug).toBe(true)
  })
})
