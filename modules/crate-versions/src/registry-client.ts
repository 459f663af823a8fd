import axios, { AxiosInstance } from 'axios'
import { TransientNetworkError } from 'factory-errors'
import { Logger } from 'logger'
import { aTimeoutOf, describeError } from 'misc'
import { z } from 'zod'

export const CRATES_API = 'https://crates.io/api/v1'

const VersionsResponse = z
  .object({
    versions: z
      .object({
        num: z.string().default(''),
        yanked: z.boolean().default(false),
      })
      .passthrough()
      .array()
      .default([]),
  })
  .passthrough()

const DependenciesResponse = z
  .object({
    dependencies: z
      .object({
        crate_id: z.string().default(''),
      })
      .passthrough()
      .array()
      .default([]),
  })
  .passthrough()

/**
 * The read-only registry operations the factory needs.
 */
export interface CrateRegistry {
  /**
   * All published, non-yanked versions of a crate, in the order the registry lists them.
   */
  fetchNonYankedVersions(crateName: string): Promise<string[]>
  /**
   * The names of the crates a given crate version depends on.
   */
  fetchDependencyIds(crateName: string, version: string): Promise<string[]>
  /**
   * A plain-text document (e.g. an upstream workspace manifest).
   */
  fetchText(url: string): Promise<string>
}

export interface RegistryClientOptions {
  apiBase?: string
  /**
   * Total number of attempts per request.
   */
  attempts?: number
  timeoutMs?: number
  /**
   * The wait after the n-th failed attempt is `min(n, 5) * backoffUnitMs`.
   */
  backoffUnitMs?: number
  http?: AxiosInstance
}

export class RegistryClient implements CrateRegistry {
  private readonly apiBase: string
  private readonly attempts: number
  private readonly timeoutMs: number
  private readonly backoffUnitMs: number
  private readonly http: AxiosInstance

  constructor(
    private readonly logger: Logger,
    options: RegistryClientOptions = {},
  ) {
    this.apiBase = options.apiBase ?? CRATES_API
    this.attempts = Math.max(1, options.attempts ?? 6)
    this.timeoutMs = options.timeoutMs ?? 45_000
    this.backoffUnitMs = options.backoffUnitMs ?? 1_000
    this.http = options.http ?? axios.create()
  }

  async fetchNonYankedVersions(crateName: string): Promise<string[]> {
    const url = `${this.apiBase}/crates/${encodeURIComponent(crateName)}/versions`
    const parsed = VersionsResponse.parse(await this.get(url, 'json'))
    return parsed.versions.filter(at => !at.yanked).flatMap(at => (at.num.trim() ? [at.num.trim()] : []))
  }

  async fetchDependencyIds(crateName: string, version: string): Promise<string[]> {
    const url = `${this.apiBase}/crates/${encodeURIComponent(crateName)}/${encodeURIComponent(version)}/dependencies`
    const parsed = DependenciesResponse.parse(await this.get(url, 'json'))
    return parsed.dependencies.map(at => at.crate_id).filter(Boolean)
  }

  async fetchText(url: string): Promise<string> {
    const data = await this.get(url, 'text')
    if (typeof data !== 'string') {
      throw new Error(`expected a text response from ${url}`)
    }
    return data
  }

  private async get(url: string, responseType: 'json' | 'text'): Promise<unknown> {
    let lastError = 'no attempt made'
    for (let attempt = 1; attempt <= this.attempts; ++attempt) {
      try {
        const response = await this.http.get<unknown>(url, {
          responseType,
          timeout: this.timeoutMs,
          headers: {
            'User-Agent': 'rlib-factory/1.0',
            Accept: 'application/json,text/plain,*/*',
          },
          validateStatus: () => true,
        })
        if (response.status >= 200 && response.status < 300) {
          return response.data
        }
        lastError = `HTTP ${response.status}`
      } catch (e) {
        lastError = describeError(e)
      }

      this.logger.debug(`GET ${url} failed (attempt ${attempt}/${this.attempts}): ${lastError}`)
      if (attempt < this.attempts) {
        await aTimeoutOf(Math.min(attempt, 5) * this.backoffUnitMs).hasPassed()
      }
    }
    throw new TransientNetworkError(url, this.attempts, lastError)
  }
}
