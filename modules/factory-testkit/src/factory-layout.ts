import * as fse from 'fs-extra'
import * as path from 'path'
import * as Tmp from 'tmp-promise'

/**
 * A throwaway factory directory tree, with a fake home directory whose `~/.cargo/bin` holds executable `cargo` and
 * `rustc` stand-ins.
 */
export interface FactoryLayout {
  root: string
  homeDir: string
  toolchainsDir: string
  cratesDir: string
  scriptsDir: string
  rlibsDir: string
  versionsDir: string
  stateDir: string
  /**
   * An environment with an empty PATH (so only `~/.cargo/bin` contributes tools).
   */
  env: NodeJS.ProcessEnv
}

export async function createFactoryLayout(options: { hostTools?: string[] } = {}): Promise<FactoryLayout> {
  const dir = await Tmp.dir({ unsafeCleanup: true })
  const root = dir.path
  const homeDir = path.join(root, 'home')
  const cargoBin = path.join(homeDir, '.cargo', 'bin')
  await fse.ensureDir(cargoBin)
  for (const tool of options.hostTools ?? ['cargo', 'rustc']) {
    await fse.writeFile(path.join(cargoBin, tool), '#!/bin/sh\n', { mode: 0o755 })
  }

  const ret: FactoryLayout = {
    root,
    homeDir,
    toolchainsDir: path.join(root, 'solana'),
    cratesDir: path.join(root, 'crates'),
    scriptsDir: root,
    rlibsDir: path.join(root, 'rlibs'),
    versionsDir: path.join(root, 'versions'),
    stateDir: path.join(root, 'run-state'),
    env: { PATH: '' },
  }
  await fse.ensureDir(ret.toolchainsDir)
  await fse.ensureDir(ret.cratesDir)
  return ret
}

export async function installRelease(layout: FactoryLayout, solanaVersion: string) {
  await fse.outputFile(
    path.join(layout.toolchainsDir, `solana-release-${solanaVersion}`, 'bin', 'cargo-build-sbf'),
    '#!/bin/sh\n',
    { mode: 0o755 },
  )
}

export async function addCrateSource(
  layout: FactoryLayout,
  crateName: string,
  version: string,
  files: Record<string, string> = {},
) {
  const dir = path.join(layout.cratesDir, `${crateName}-${version}`)
  await fse.outputFile(path.join(dir, 'Cargo.toml'), `[package]\nname = "${crateName}"\nversion = "${version}"\n`)
  for (const [name, content] of Object.entries(files)) {
    await fse.outputFile(path.join(dir, name), content)
  }
  return dir
}
