import { KubernetesObject } from '@kubernetes/client-node'

export const getResourceKey = (resource: KubernetesObject): string =>
  `${resource.metadata?.namespace || 'default'}/${resource.metadata?.name ?? ''}`

export class ResourceStore<T extends KubernetesObject> {
  private readonly resources = new Map<string, T>()

  add(resource: T) {
    this.resources.set(getResourceKey(resource), resource)
  }

  delete(resource: T) {
    this.resources.delete(getResourceKey(resource))
  }

  get(key: string): T | undefined {
    return this.resources.get(key)
  }

  list(): Array<T> {
    return [...this.resources.entries()]
      .sort(([a], [b]) => (a < b ? -1 : 1))
      .map(([, resource]) => resource)
  }

  get size(): number {
    return this.resources.size
  }
}
