import * as fs from 'fs'
import * as path from 'path'
import * as Tmp from 'tmp-promise'

import { readLines, writeLines } from '../src/line-lists'

describe('line-lists', () => {
  test('a missing file is an empty list', async () => {
    const dir = (await Tmp.dir()).path
    expect(await readLines(path.join(dir, 'nope.txt'))).toEqual([])
  })
  test('trims entries and drops blank lines', async () => {
    const dir = (await Tmp.dir()).path
    const file = path.join(dir, 'list.txt')
    fs.writeFileSync(file, '  spl-token \n\n\r\nborsh\r\n')
    expect(await readLines(file)).toEqual(['spl-token', 'borsh'])
  })
  test('writes one entry per line with a trailing newline', async () => {
    const dir = (await Tmp.dir()).path
    const file = path.join(dir, 'sub', 'list.txt')
    await writeLines(file, ['a', 'b'])
    expect(fs.readFileSync(file, 'utf-8')).toEqual('a\nb\n')
    expect(await readLines(file)).toEqual(['a', 'b'])
  })
})
