import { CoreV1Api }        from '@kubernetes/client-node'
import { HttpError }        from '@kubernetes/client-node'
import { KubeConfig }       from '@kubernetes/client-node'
import { KubernetesObject } from '@kubernetes/client-node'

import { Logger }           from '@appgw-ingress/logger'

import { EventRecorder }    from './event-recorder.interfaces'
import { EventType }        from './event-recorder.interfaces'

export class KubernetesEventRecorder implements EventRecorder {
  private readonly logger = new Logger(KubernetesEventRecorder.name)

  private readonly coreApi: CoreV1Api

  constructor(
    kubeConfig: KubeConfig,
    private readonly component: string = 'appgw-ingress'
  ) {
    this.coreApi = kubeConfig.makeApiClient(CoreV1Api)
  }

  private async createEvent(
    object: KubernetesObject,
    type: EventType,
    reason: string,
    message: string
  ) {
    const namespace = object.metadata?.namespace || 'default'
    const name = object.metadata?.name ?? 'unknown'
    const timestamp = new Date()

    await this.coreApi.createNamespacedEvent(namespace, {
      metadata: {
        generateName: `${name}.`,
        namespace,
      },
      involvedObject: {
        apiVersion: object.apiVersion,
        kind: object.kind,
        name,
        namespace,
        uid: object.metadata?.uid,
        resourceVersion: object.metadata?.resourceVersion,
      },
      type,
      reason,
      message,
      count: 1,
      firstTimestamp: timestamp,
      lastTimestamp: timestamp,
      source: {
        component: this.component,
      },
      reportingComponent: this.component,
    })
  }

  event(object: KubernetesObject, type: EventType, reason: string, message: string) {
    this.createEvent(object, type, reason, message).catch((error: unknown) => {
      this.logger.error(`Unable to record ${type} event ${reason}`, {
        err: error instanceof HttpError ? error.body : error,
      })
    })
  }
}
