import type { EnvLookup, FieldSchema } from "../../../ports/field"
import {
  ConfigTargetError,
  FieldCoercionError,
  InvalidValueError,
  RequiredFieldsError,
} from "../../errors"
import { field } from "../../field"
import { bindFields } from "../bind-fields"
import { createEnvLookup } from "../env-lookup"

interface ServerConfig {
  serverPort: string
  dbHost: string
  dbPassword: string
  debugMode: boolean
  maxUsers: number
  timeout: number
  ratio: number
  allowedHosts: string[]
  notes?: string
}

const schema: FieldSchema<ServerConfig> = {
  serverPort: field.string("SERVER_PORT,8080"),
  dbHost: field.string("DB_HOST,localhost"),
  dbPassword: field.string("DB_PASSWORD,required"),
  debugMode: field.bool("DEBUG_MODE,false"),
  maxUsers: field.int("MAX_USERS,100"),
  timeout: field.duration("TIMEOUT,30s"),
  ratio: field.float("RATIO,3.14"),
  allowedHosts: field.list("ALLOWED_HOSTS,localhost,127.0.0.1"),
}

function emptyConfig(): ServerConfig {
  return {
    serverPort: "",
    dbHost: "",
    dbPassword: "",
    debugMode: true,
    maxUsers: 0,
    timeout: 0,
    ratio: 0,
    allowedHosts: [],
  }
}

function lookupFrom(env: Record<string, string>): EnvLookup {
  return (name) => env[name]
}

describe("bindFields", () => {
  afterEach(() => {
    vi.unstubAllEnvs()
  })

  describe("resolution", () => {
    it("applies defaults when only required values are set", () => {
      const cfg = emptyConfig()

      bindFields(cfg, schema, { lookup: lookupFrom({ DB_PASSWORD: "test-secret" }) })

      expect(cfg).toEqual({
        serverPort: "8080",
        dbHost: "localhost",
        dbPassword: "test-secret",
        debugMode: false,
        maxUsers: 100,
        timeout: 30_000,
        ratio: 3.14,
        allowedHosts: ["localhost", "127.0.0.1"],
      })
    })

    it("prefers environment values over defaults", () => {
      const cfg = emptyConfig()

      bindFields(cfg, schema, {
        lookup: lookupFrom({
          SERVER_PORT: "3000",
          DB_PASSWORD: "test-secret",
          DEBUG_MODE: "on",
          MAX_USERS: "250",
          TIMEOUT: "1h30m",
          RATIO: "2.71",
          ALLOWED_HOSTS: " api.internal , , web.internal ",
        }),
      })

      expect(cfg.serverPort).toBe("3000")
      expect(cfg.debugMode).toBe(true)
      expect(cfg.maxUsers).toBe(250)
      expect(cfg.timeout).toBe(5_400_000)
      expect(cfg.ratio).toBe(2.71)
      expect(cfg.allowedHosts).toEqual(["api.internal", "web.internal"])
    })

    it("treats an empty variable as unset", () => {
      const cfg = emptyConfig()

      bindFields(cfg, schema, {
        lookup: lookupFrom({ SERVER_PORT: "", DB_PASSWORD: "test-secret" }),
      })

      expect(cfg.serverPort).toBe("8080")
    })

    it("leaves fields with no value and no default untouched", () => {
      const cfg = { name: "initial" }

      const report = bindFields(cfg, { name: field.string("APP_NAME") }, { lookup: () => undefined })

      expect(cfg.name).toBe("initial")
      expect(report).toEqual({ sources: {}, unresolved: ["name"] })
    })

    it("treats an empty default as no default", () => {
      const cfg = { name: "initial" }

      bindFields(cfg, { name: field.string("APP_NAME,") }, { lookup: () => undefined })

      expect(cfg.name).toBe("initial")
    })

    it("skips fields without a declaration or with an empty tag", () => {
      const cfg = { a: "keep", b: "keep" }
      const lookup = vi.fn<EnvLookup>(() => "changed")

      bindFields(cfg, { b: field.string("") }, { lookup })

      expect(cfg).toEqual({ a: "keep", b: "keep" })
      expect(lookup).not.toHaveBeenCalled()
    })

    it("reports where each field came from", () => {
      const report = bindFields(emptyConfig(), schema, {
        lookup: lookupFrom({ DB_PASSWORD: "test-secret", MAX_USERS: "5" }),
      })

      expect(report.unresolved).toEqual([])
      expect(report.sources).toEqual({
        serverPort: "default",
        dbHost: "default",
        dbPassword: "env",
        debugMode: "default",
        maxUsers: "env",
        timeout: "default",
        ratio: "default",
        allowedHosts: "default",
      })
    })

    it("reads process.env when no lookup is given", () => {
      vi.stubEnv("ENVTAG_BIND_TEST_PORT", "9999")
      const cfg = { port: 0 }

      bindFields(cfg, { port: field.int("ENVTAG_BIND_TEST_PORT,1") })

      expect(cfg.port).toBe(9999)
    })
  })

  describe("required fields", () => {
    it("reports a missing required variable", () => {
      expect(() => bindFields(emptyConfig(), schema, { lookup: () => undefined })).toThrow(
        "validation errors: DB_PASSWORD is required",
      )
    })

    it("collects every violation in declaration order", () => {
      const cfg = { apiKey: "", region: "", port: 0 }

      try {
        bindFields(
          cfg,
          {
            apiKey: field.string("API_KEY,required"),
            port: field.int("PORT,8080"),
            region: field.string("REGION,required"),
          },
          { lookup: () => undefined },
        )
        expect.unreachable()
      } catch (err) {
        expect(err).toBeInstanceOf(RequiredFieldsError)
        expect((err as RequiredFieldsError).message).toBe(
          "validation errors: API_KEY is required; REGION is required",
        )
        expect((err as RequiredFieldsError).context).toEqual({ variables: ["API_KEY", "REGION"] })
      }

      // fields after a violation are still bound
      expect(cfg.port).toBe(8080)
    })

    it("treats an empty required variable as missing", () => {
      expect(() =>
        bindFields(emptyConfig(), schema, { lookup: lookupFrom({ DB_PASSWORD: "" }) }),
      ).toThrow(RequiredFieldsError)
    })
  })

  describe("coercion failures", () => {
    it("fails fast naming the field", () => {
      const lookup = lookupFrom({ DB_PASSWORD: "test-secret", MAX_USERS: "abc" })

      try {
        bindFields(emptyConfig(), schema, { lookup })
        expect.unreachable()
      } catch (err) {
        expect(err).toBeInstanceOf(FieldCoercionError)
        const coercion = err as FieldCoercionError
        expect(coercion.message).toBe("error setting field maxUsers: invalid integer value 'abc'")
        expect(coercion.context).toEqual({
          field: "maxUsers",
          variable: "MAX_USERS",
          kind: "int",
          value: "abc",
        })
        expect(coercion.cause).toBeInstanceOf(InvalidValueError)
      }
    })

    it("wins over required violations collected earlier", () => {
      const cfg = { token: "", retries: 0 }

      expect(() =>
        bindFields(
          cfg,
          { token: field.string("TOKEN,required"), retries: field.int("RETRIES,lots") },
          { lookup: () => undefined },
        ),
      ).toThrow("error setting field retries: invalid integer value 'lots'")
    })

    it("reports an invalid default the same way", () => {
      const cfg = { verbose: false }

      expect(() =>
        bindFields(cfg, { verbose: field.bool("VERBOSE,maybe") }, { lookup: () => undefined }),
      ).toThrow("error setting field verbose: invalid boolean value 'maybe'")
    })

    it("wraps unsupported kinds", () => {
      const odd = { kind: "map", tag: "LABELS,a=b" }
      const cfg = { labels: "" }

      expect(() =>
        bindFields(cfg, { labels: odd } as unknown as FieldSchema<typeof cfg>, {
          lookup: () => undefined,
        }),
      ).toThrow("error setting field labels: unsupported field type: map")
    })
  })

  describe("inherited property names", () => {
    it("treats variables named after Object.prototype members as unset", () => {
      const cfg = { name: "", hosts: [] as string[] }

      const report = bindFields(
        cfg,
        { name: field.string("constructor,fallback"), hosts: field.list("toString,a,b") },
        { lookup: createEnvLookup({ env: {} }) },
      )

      expect(cfg).toEqual({ name: "fallback", hosts: ["a", "b"] })
      expect(report.sources).toEqual({ name: "default", hosts: "default" })
    })

    it("reports a required prototype-named variable as missing", () => {
      const cfg = { secret: "" }

      expect(() =>
        bindFields(
          cfg,
          { secret: field.string("hasOwnProperty,required") },
          { lookup: createEnvLookup({ env: {} }) },
        ),
      ).toThrow("validation errors: hasOwnProperty is required")
    })
  })

  describe("target validation", () => {
    it.each([
      [null, "null"],
      [[], "array"],
      ["text", "string"],
    ])("rejects %j", (target, received) => {
      expect(() => bindFields(target as unknown as object, {})).toThrow(ConfigTargetError)
      expect(() => bindFields(target as unknown as object, {})).toThrow(
        `config target must be a settable object, received ${received}`,
      )
    })

    it("rejects a frozen target before binding anything", () => {
      const cfg = Object.freeze({ port: 0 })
      const lookup = vi.fn<EnvLookup>(() => "9090")

      expect(() => bindFields(cfg, { port: field.int("PORT,8080") }, { lookup })).toThrow(
        "config target must be a settable object, received read-only field port",
      )
      expect(lookup).not.toHaveBeenCalled()
    })

    it("rejects a non-extensible target missing a declared field", () => {
      const cfg: { port?: number } = Object.preventExtensions({})

      expect(() =>
        bindFields(cfg, { port: field.int("PORT,8080") }, { lookup: () => undefined }),
      ).toThrow(ConfigTargetError)
    })

    it("binds a sealed target whose fields already exist", () => {
      const cfg = Object.seal({ port: 0 })

      bindFields(cfg, { port: field.int("PORT,8080") }, { lookup: () => undefined })

      expect(cfg.port).toBe(8080)
    })

    it("rejects a schema that is not an object", () => {
      expect(() => bindFields({}, null as unknown as FieldSchema<object>)).toThrow(
        "config target must be a settable object, received null schema",
      )
    })
  })
})
