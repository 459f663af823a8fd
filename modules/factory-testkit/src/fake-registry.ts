import { CrateRegistry } from 'crate-versions'

/**
 * An in-memory registry. When `online` is false every call fails, as if the network were down.
 */
export class FakeRegistry implements CrateRegistry {
  online = true
  readonly versionRequests: string[] = []

  constructor(
    private readonly versions: Record<string, string[]> = {},
    private readonly texts: Record<string, string> = {},
  ) {}

  async fetchNonYankedVersions(crateName: string): Promise<string[]> {
    this.check()
    this.versionRequests.push(crateName)
    return this.versions[crateName] ?? []
  }

  async fetchDependencyIds(_crateName: string, _version: string): Promise<string[]> {
    this.check()
    return []
  }

  async fetchText(url: string): Promise<string> {
    this.check()
    const ret = this.texts[url]
    if (ret === undefined) {
      throw new Error(`no such document: ${url}`)
    }
    return ret
  }

  private check() {
    if (!this.online) {
      throw new Error('network is down')
    }
  }
}
