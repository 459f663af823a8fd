type CamelizeString<T extends PropertyKey, C extends string = ''> = T extends string
  ? string extends T
    ? string
    : T extends `${infer F}-${infer R}`
    ? CamelizeString<Capitalize<R>, `${C}${F}`>
    : `${C}${T}`
  : T

export type CamelizeRecord<T> = { [K in keyof T as CamelizeString<K>]: T[K] }

function camelize(key: string) {
  return key.replace(/-([a-zA-Z0-9])/g, (_, c: string) => c.toUpperCase())
}

/**
 * Renames kebab-case keys (as yargs produces them for `--dry-run` style flags) to camelCase.
 */
export function camelizeRecord<T extends Record<string, unknown>>(rec: T): CamelizeRecord<T> {
  const ret: Record<string, unknown> = {}
  for (const [k, v] of Object.entries(rec)) {
    ret[camelize(k)] = v
  }

  return ret as CamelizeRecord<T> // eslint-disable-line @typescript-eslint/consistent-type-assertions
}
