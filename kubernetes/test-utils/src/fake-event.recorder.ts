import { KubernetesObject } from '@kubernetes/client-node'

import { EventRecorder }    from '@appgw-ingress/k8s-event-recorder'
import { EventType }        from '@appgw-ingress/k8s-event-recorder'

export interface RecordedEvent {
  object: KubernetesObject
  type: EventType
  reason: string
  message: string
}

export class FakeEventRecorder implements EventRecorder {
  readonly events: Array<RecordedEvent> = []

  event(object: KubernetesObject, type: EventType, reason: string, message: string) {
    this.events.push({ object, type, reason, message })
  }

  get reasons(): Array<string> {
    return this.events.map((event) => event.reason)
  }
}
