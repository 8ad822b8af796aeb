export const INTERNAL_STORAGE = "Internal storage"
export const SD_CARD = "SD Card"
export const DEFAULT_STORAGE = INTERNAL_STORAGE

export interface DevicePath {
  readonly storage: string
  readonly segments: ReadonlyArray<string>
}

const storagePrefixes: ReadonlyArray<readonly [string, string]> = [
  ["~/is/", INTERNAL_STORAGE],
  ["~/sd/", SD_CARD],
  [`${INTERNAL_STORAGE}/`, INTERNAL_STORAGE],
  [`${INTERNAL_STORAGE}\\`, INTERNAL_STORAGE],
  [`${SD_CARD}/`, SD_CARD],
  [`${SD_CARD}\\`, SD_CARD]
]

const splitPrefix = (value: string): readonly [string, string] => {
  for (const [prefix, storage] of storagePrefixes) {
    if (value.startsWith(prefix)) {
      return [storage, value.slice(prefix.length)]
    }
  }
  return [DEFAULT_STORAGE, value.startsWith("/") ? value.slice(1) : value]
}

/**
 * Splits a device path into its storage area and path segments.
 *
 * @pure true
 * @invariant segments never contain "" or a separator
 */
export const normalizeDevicePath = (devicePath: string): DevicePath => {
  const [storage, remainder] = splitPrefix(devicePath.trim())
  const segments = remainder
    .replaceAll("\\", "/")
    .split("/")
    .filter((segment) => segment.length > 0)
  return { storage, segments }
}

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g

// encodeURIComponent throws on lone surrogates and leaves !'()* alone
export const encodeSegment = (segment: string): string =>
  encodeURIComponent(segment.replace(LONE_SURROGATE, "\uFFFD")).replace(
    /[!'()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`
  )

/**
 * Builds the full device address for a namespace-relative path.
 *
 * @param baseAddress - Activation address of the device, e.g. `mtp://[usb:003,009]/`.
 * @param relativePath - Path on the device, optionally prefixed with a storage area.
 *
 * @pure true
 * @invariant result starts with baseAddress (plus a trailing "/") followed by a storage label
 * @complexity O(n) where n = |relativePath|
 */
export const resolveDeviceAddress = (
  baseAddress: string,
  relativePath: string
): string => {
  const base = baseAddress.endsWith("/") ? baseAddress : `${baseAddress}/`
  const { segments, storage } = normalizeDevicePath(relativePath)
  const encoded = segments.map((segment) => encodeSegment(segment))
  return encoded.length === 0 ? `${base}${storage}` : `${base}${storage}/${encoded.join("/")}`
}

export interface DesktopEnv {
  readonly homedir: string
  readonly env: (key: string) => string | undefined
}

const expandVariables = (value: string, lookup: DesktopEnv["env"]): string =>
  value
    .replace(
      /\$\{([A-Za-z0-9_]+)(?::-([^}]*))?\}/g,
      (match: string, name: string, fallback: string | undefined): string => {
        const resolved = lookup(name)
        if (fallback === undefined) {
          return resolved ?? match
        }
        return resolved !== undefined && resolved.length > 0 ? resolved : fallback
      }
    )
    .replace(/\$([A-Za-z_][A-Za-z0-9_]*)/g, (match: string, name: string): string => lookup(name) ?? match)

/**
 * Expands `~` and environment variables in a desktop path.
 * Making the result absolute is left to the caller's path service.
 *
 * @pure true
 * @invariant a leading "~" never survives expansion
 */
export const expandDesktopPath = (desktopPath: string, env: DesktopEnv): string => {
  const expanded = expandVariables(desktopPath.trim(), env.env)
  if (expanded === "~") {
    return env.homedir
  }
  if (expanded.startsWith("~/")) {
    return `${env.homedir.replace(/\/+$/, "")}/${expanded.slice(2)}`
  }
  return expanded
}
