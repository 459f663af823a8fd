import { CamelizeRecord, camelizeRecord } from '../src/camelize-record'

type Flags = Record<'dry-run' | 'max-crates' | 'scope', string | number | boolean>

describe('camelize-record', () => {
  test('camelCases kebab-case attribute names', () => {
    const flags: Flags = {
      'dry-run': true,
      'max-crates': 3,
      scope: 'anchor',
    }

    const output: CamelizeRecord<Flags> = camelizeRecord(flags)
    expect(output).toEqual({ dryRun: true, maxCrates: 3, scope: 'anchor' })
  })
  test('handles several dashes in one name', () => {
    expect(camelizeRecord({ 'fallback-compiler-version': '1.18.16' })).toEqual({ fallbackCompilerVersion: '1.18.16' })
  })
})
