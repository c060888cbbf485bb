import { KubernetesObject } from '@kubernetes/client-node'

export interface ResourceMeta {
  id: string
  name: string
  namespace?: string
  resourceVersion: string
  apiVersion: string
  kind: string
}

export class ResourceMetaImpl implements ResourceMeta {
  static createWithId(id: string, object: KubernetesObject): ResourceMeta {
    return new ResourceMetaImpl(id, object)
  }

  static createWithPlural(plural: string, object: KubernetesObject): ResourceMeta {
    return new ResourceMetaImpl(`${plural}.${object.apiVersion}`, object)
  }

  readonly name: string

  readonly namespace?: string

  readonly resourceVersion: string

  readonly apiVersion: string

  readonly kind: string

  private constructor(readonly id: string, object: KubernetesObject) {
    const name = object.metadata?.name
    const resourceVersion = object.metadata?.resourceVersion

    if (!name || !resourceVersion || !object.apiVersion || !object.kind) {
      throw new Error(`Malformed event object for '${id}'`)
    }

    this.name = name
    this.namespace = object.metadata?.namespace
    this.resourceVersion = resourceVersion
    this.apiVersion = object.apiVersion
    this.kind = object.kind
  }
}
