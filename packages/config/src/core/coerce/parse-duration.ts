import { InvalidValueError } from "../errors"

/** Nanoseconds per unit. */
const UNITS: Readonly<Record<string, bigint>> = {
  ns: 1n,
  us: 1_000n,
  "µs": 1_000n,
  "μs": 1_000n,
  ms: 1_000_000n,
  s: 1_000_000_000n,
  m: 60_000_000_000n,
  h: 3_600_000_000_000n,
}

const COMPONENT = /^(\d*)(?:\.(\d*))?([^\d.]+)/

const MAX_NS = 2n ** 63n - 1n

/**
 * Parses `300ms`, `-1.5h`, `2h45m` and the bare `0` into milliseconds.
 * Every other number needs a unit.
 */
export function parseDuration(raw: string): number {
  const invalid = () => new InvalidValueError(`invalid duration value '${raw}'`, "duration", raw)

  let rest = raw
  let negative = false

  if (rest.startsWith("-") || rest.startsWith("+")) {
    negative = rest[0] === "-"
    rest = rest.slice(1)
  }

  if (rest === "0") return 0
  if (rest === "") throw invalid()

  let total = 0n

  while (rest !== "") {
    const match = COMPONENT.exec(rest)
    if (!match) throw invalid()

    const [component, whole = "", fraction = "", unit = ""] = match
    if (whole === "" && fraction === "") throw invalid()

    const perUnit = UNITS[unit]
    if (perUnit === undefined) throw invalid()

    total += BigInt(whole || "0") * perUnit
    // fractional nanoseconds are truncated
    if (fraction !== "") total += (BigInt(fraction) * perUnit) / 10n ** BigInt(fraction.length)
    if (total > MAX_NS) throw invalid()

    rest = rest.slice(component.length)
  }

  if (total === 0n) return 0

  const ms = Number(total) / 1e6
  return negative ? -ms : ms
}

const PARTS: ReadonlyArray<readonly [string, number]> = [
  ["h", 3_600_000],
  ["m", 60_000],
  ["s", 1000],
]

/**
 * Compact rendering of a millisecond duration: `1h30m`, `1m30s`, `500ms`, `0s`.
 */
export function formatDuration(ms: number): string {
  if (ms === 0) return "0s"
  if (!Number.isFinite(ms)) return String(ms)

  let rest = Math.abs(ms)
  let out = ms < 0 ? "-" : ""

  for (const [unit, size] of PARTS) {
    const count = Math.floor(rest / size)
    if (count > 0) {
      out += `${count}${unit}`
      rest -= count * size
    }
  }

  if (rest > 0) out += `${Number(rest.toFixed(6))}ms`

  return out
}
