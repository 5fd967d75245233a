import { InvalidValueError } from "../../errors"
import { parseBool } from "../parse-bool"

describe("parseBool", () => {
  it.each(["true", "TRUE", "True", "1", "yes", "YES", "on", "On", "t", "T"])(
    "reads %j as true",
    (raw) => {
      expect(parseBool(raw)).toBe(true)
    },
  )

  it.each(["false", "FALSE", "0", "no", "No", "off", "OFF", "f", "F", ""])(
    "reads %j as false",
    (raw) => {
      expect(parseBool(raw)).toBe(false)
    },
  )

  it.each(["maybe", "2", "enabled", " true"])("rejects %j", (raw) => {
    expect(() => parseBool(raw)).toThrow(`invalid boolean value '${raw}'`)
  })

  it("throws InvalidValueError with the value in context", () => {
    try {
      parseBool("maybe")
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidValueError)
      expect((err as InvalidValueError).context).toEqual({ kind: "bool", value: "maybe" })
    }
  })
})
