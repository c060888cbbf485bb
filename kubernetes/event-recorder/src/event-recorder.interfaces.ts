import { KubernetesObject } from '@kubernetes/client-node'

export enum EventType {
  Normal = 'Normal',
  Warning = 'Warning',
}

export interface EventRecorder {
  event(object: KubernetesObject, type: EventType, reason: string, message: string): void
}
