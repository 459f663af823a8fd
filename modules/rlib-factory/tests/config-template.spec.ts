import * as JsoncParser from 'jsonc-parser'
import { z } from 'zod'

import { configTemplate } from '../src/config-template'
import { FactoryConfig } from '../src/factory-config'

describe('config-template', () => {
  test('lists every field with its description and default', () => {
    const schema = z.object({
      a: z.string().default('abc').describe('lorem ipsum'),
      b: z.number().optional(),
      c: z.enum(['x', 'y']).default('y'),
    })
    expect(configTemplate(schema, false)).toEqual(
      ['{', '  // lorem ipsum', '  "a": "abc",', '  // "b": 0,', '  // One of: "x", "y".', '  "c": "y",', '}'].join('\n'),
    )
  })
  test('comments out every line', () => {
    expect(configTemplate(z.object({ a: z.boolean() }))).toEqual(['//{', '//  "a": false,', '//}'].join('\n'))
  })
  test('the uncommented template of the factory config parses back to the defaults', () => {
    const parsed: unknown = JsoncParser.parse(configTemplate(FactoryConfig, false), [], { allowTrailingComma: true })
    expect(FactoryConfig.parse(parsed)).toEqual(FactoryConfig.parse({}))
  })
})
