import { failMe } from 'misc'
import { z, ZodArray, ZodBoolean, ZodDefault, ZodEnum, ZodNullable, ZodNumber, ZodOptional, ZodString, ZodTypeAny } from 'zod'

interface Reflected {
  description: string | undefined
  defaultValue: unknown
  /**
   * Optional without a default: the field is listed but stays commented out.
   */
  optional: boolean
}

function unwrapSchema(schema: ZodTypeAny): ZodTypeAny {
  if (schema instanceof ZodOptional || schema instanceof ZodNullable) {
    return unwrapSchema(schema.unwrap())
  }
  if (schema instanceof ZodDefault) {
    return unwrapSchema(schema.removeDefault())
  }
  return schema
}

function getDescription(schema: ZodTypeAny): string | undefined {
  if (schema.description) {
    return schema.description
  }
  if (schema instanceof ZodOptional || schema instanceof ZodNullable) {
    return getDescription(schema.unwrap())
  }
  if (schema instanceof ZodDefault) {
    return getDescription(schema.removeDefault())
  }
  return undefined
}

function placeholderOf(schema: ZodTypeAny): unknown {
  if (schema instanceof ZodString) {
    return ''
  }
  if (schema instanceof ZodNumber) {
    return 0
  }
  if (schema instanceof ZodBoolean) {
    return false
  }
  if (schema instanceof ZodArray) {
    return []
  }
  if (schema instanceof ZodEnum) {
    const options: unknown[] = schema.options
    return options.at(0) ?? failMe('an enum with no options')
  }
  throw new Error(`unsupported config field type: ${schema.constructor.name}`)
}

function reflect(schema: ZodTypeAny): Reflected {
  const unwrapped = unwrapSchema(schema)
  let description = getDescription(schema)
  if (unwrapped instanceof ZodEnum) {
    const options: unknown[] = unwrapped.options
    description = [description, `One of: ${options.map(at => JSON.stringify(at)).join(', ')}.`].filter(Boolean).join(' ')
  }
  const defaultValue: unknown = schema instanceof ZodDefault ? schema.parse(undefined) : placeholderOf(unwrapped)
  return { description, defaultValue, optional: schema instanceof ZodOptional }
}

class Writer {
  private readonly lines: string[] = []

  constructor(private readonly prefix: string) {}

  write(line: string) {
    this.lines.push(`${this.prefix}${line}`)
  }

  getOutput() {
    return this.lines.join('\n')
  }
}

/**
 * Renders a config file template from an object schema: every field with its description (as comments) and its
 * default value. With `comment` on, every line is commented out, so the template is a valid (empty) config file.
 * Optional fields without a default are always commented out.
 */
export function configTemplate(schema: z.AnyZodObject, comment = true): string {
  const w = new Writer(comment ? '//' : '')
  const shape: Record<string, ZodTypeAny> = schema.shape
  w.write('{')
  for (const [k, v] of Object.entries(shape)) {
    const r = reflect(v)
    if (r.description) {
      for (const line of r.description.split('\n')) {
        w.write(`  // ${line}`)
      }
    }
    w.write(`  ${r.optional ? '// ' : ''}${JSON.stringify(k)}: ${JSON.stringify(r.defaultValue)},`)
  }
  w.write('}')
  return w.getOutput()
}
