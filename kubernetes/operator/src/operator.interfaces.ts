import { KubernetesObject }  from '@kubernetes/client-node'

import { ResourceEventType } from './operator.enums'
import { ResourceMeta }      from './resource-meta.impl'

/**
 * Watch notification for a single object, with the identity the handlers key caches by.
 */
export interface ResourceEvent {
  type: ResourceEventType
  meta: ResourceMeta
  object: KubernetesObject
}

export type ResourceEventHandler = (event: ResourceEvent) => Promise<void>

// Events are handled one at a time in arrival order.
export interface QueuedResourceEvent {
  event: ResourceEvent
  handler: ResourceEventHandler
}
