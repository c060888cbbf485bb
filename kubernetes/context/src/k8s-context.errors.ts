export class CacheLookupError extends Error {
  constructor(public readonly key: string) {
    super(`Invalid cache key "${key}", expected "<namespace>/<name>"`)

    this.name = CacheLookupError.name
  }
}
