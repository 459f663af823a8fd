import { SbfArch } from 'build-orchestrator'

const DEP_RLIB_STEM = /^lib(.+)-([0-9a-f]{16})$/

export function toolsTagOf(toolsVersion: string) {
  return toolsVersion.replace(/\./g, '_')
}

export function underscored(crateName: string) {
  return crateName.replace(/-/g, '_')
}

/**
 * e.g., `libspl_memo-4.0.1-sbfv1-v1_48.rlib`
 */
export function artifactFileName(crateName: string, version: string, arch: SbfArch, toolsVersion: string) {
  return `lib${underscored(crateName)}-${version}-${arch}-${toolsTagOf(toolsVersion)}.rlib`
}

/**
 * Names a dependency rlib (`lib<name>-<16 hex digit hash>`) by its locked version when the lockfile pins exactly one
 * version of it, e.g. `libarrayref-0cbcb299f4d7550d` becomes `libarrayref-0.3.9-sbfv1-v1_48.rlib`. Otherwise the hash
 * stays in the name.
 */
export function depArtifactFileName(
  stem: string,
  lockVersions: ReadonlyMap<string, readonly string[]>,
  arch: SbfArch,
  toolsVersion: string,
) {
  const suffix = `${arch}-${toolsTagOf(toolsVersion)}.rlib`
  const m = stem.match(DEP_RLIB_STEM)
  if (!m) {
    return `${stem}-${suffix}`
  }
  const name = m[1]
  const versions = lockVersions.get(name) ?? []
  return versions.length === 1 ? `lib${name}-${versions[0]}-${suffix}` : `${stem}-${suffix}`
}
