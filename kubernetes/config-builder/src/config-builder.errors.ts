import { KubernetesObject } from '@kubernetes/client-node'

import { EventReason }      from '@appgw-ingress/k8s-event-recorder'

export class ConfigBuilderError extends Error {
  constructor(public readonly stage: string) {
    super(`unable to generate ${stage}`)

    this.name = ConfigBuilderError.name
  }
}

export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly reason: EventReason,
    public readonly object?: KubernetesObject
  ) {
    super(message)

    this.name = ValidationError.name
  }
}
