import { ProhibitedTargetResource } from '@appgw-ingress/k8s-prohibited-target-api'

export class Target {
  constructor(
    public readonly hostname: string = '',
    public readonly path: string = ''
  ) {}

  get key(): string {
    return `${this.hostname.toLowerCase()} ${this.path}`
  }

  get isWildcard(): boolean {
    return !this.hostname && !this.path
  }

  isBlacklisted(blacklist: TargetBlacklist): boolean {
    return blacklist.has(this)
  }
}

export class TargetBlacklist {
  private readonly targets = new Map<string, Target>()

  private universal = false

  add(target: Target) {
    if (target.isWildcard) {
      this.universal = true
    } else {
      this.targets.set(target.key, target)
    }
  }

  has(target: Target): boolean {
    return this.universal || this.targets.has(target.key)
  }

  get isUniversal(): boolean {
    return this.universal
  }

  get isEmpty(): boolean {
    return !this.universal && this.targets.size === 0
  }

  toArray(): Array<Target> {
    return [...(this.universal ? [new Target()] : []), ...this.targets.values()]
  }
}

// A prohibited hostname always claims its host-level target, listed paths claim
// their own (host, path) targets on top of it.
export const getTargetBlacklist = (
  prohibitedTargets: Array<ProhibitedTargetResource>
): TargetBlacklist => {
  const blacklist = new TargetBlacklist()

  for (const prohibitedTarget of prohibitedTargets) {
    const hostname = prohibitedTarget.spec?.hostname ?? ''
    const paths = prohibitedTarget.spec?.paths ?? []

    if (hostname || paths.length === 0) {
      blacklist.add(new Target(hostname))
    }

    for (const path of paths) {
      blacklist.add(new Target(hostname, path))
    }
  }

  return blacklist
}
