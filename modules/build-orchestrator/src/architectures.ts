import { majorOf } from 'crate-versions'
import { switchOn } from 'misc'

export type SbfArch = 'sbfv1' | 'sbfv2'
export type ArchSelection = 'auto' | SbfArch | 'both'

export const ALL_ARCHS: readonly SbfArch[] = ['sbfv1', 'sbfv2']

/**
 * Crates at major 2 and above target sbfv2, everything else (including unparsable versions) targets sbfv1.
 */
export function archsForVersion(version: string): SbfArch[] {
  const major = majorOf(version)
  return major !== undefined && major >= 2 ? ['sbfv2'] : ['sbfv1']
}

export function resolveArchs(selection: ArchSelection, version: string): SbfArch[] {
  return switchOn(selection, {
    auto: () => archsForVersion(version),
    sbfv1: () => ['sbfv1'],
    sbfv2: () => ['sbfv2'],
    both: () => [...ALL_ARCHS],
  })
}

/**
 * The directory name, under `target/`, of an architecture's build output.
 */
export function targetTripleOf(arch: SbfArch): string {
  return switchOn(arch, {
    sbfv1: () => 'sbf-solana-solana',
    sbfv2: () => 'sbpfv3-solana-solana',
  })
}
