/* eslint-disable no-await-in-loop */

import { KubeConfig }           from '@kubernetes/client-node'
import { KubernetesObject }     from '@kubernetes/client-node'
import { Watch }                from '@kubernetes/client-node'
import { QueueObject }          from 'async'
import { queue }                from 'async'

import { Logger }               from '@appgw-ingress/logger'

import { QueuedResourceEvent }  from './operator.interfaces'
import { ResourceEventHandler } from './operator.interfaces'
import { ResourceMeta }         from './resource-meta.impl'
import { ResourceMetaImpl }     from './resource-meta.impl'
import { getResourceApiUri }    from './resource.utils'
import { toResourceEventType }  from './resource.utils'

interface WatchRequest {
  abort: () => void
}

export abstract class Operator {
  protected abortController = new AbortController()

  protected readonly logger: Logger

  protected kubeConfig: KubeConfig

  protected eventQueue: QueueObject<QueuedResourceEvent> = queue<QueuedResourceEvent>(
    async ({ event, handler }) => handler(event),
    1
  )

  constructor(kubeConfig?: KubeConfig) {
    this.logger = new Logger(this.constructor.name)

    if (kubeConfig) {
      this.kubeConfig = kubeConfig
    } else {
      this.kubeConfig = new KubeConfig()
      this.kubeConfig.loadFromDefault()
    }
  }

  async start(): Promise<void> {
    return this.init()
  }

  stop(): void {
    this.abortController.abort()
    this.eventQueue.kill()
  }

  protected abstract init(): Promise<void>

  protected async watchResource(
    group: string,
    version: string,
    plural: string,
    handler: ResourceEventHandler,
    namespace?: string
  ): Promise<void> {
    const uri = getResourceApiUri(group, version, plural, namespace)

    const watch = new Watch(this.kubeConfig)

    while (!this.abortController.signal.aborted) {
      await this.watchOnce(watch, uri, (phase, object) => {
        this.dispatch(plural, phase, object, handler)
      })
    }
  }

  protected dispatch(
    plural: string,
    phase: string,
    object: KubernetesObject,
    handler: ResourceEventHandler
  ): void {
    const type = toResourceEventType(phase)

    if (!type) {
      this.logger.debug(`Skipping ${phase} event for ${plural}`)

      return
    }

    let meta: ResourceMeta

    try {
      meta = ResourceMetaImpl.createWithPlural(plural, object)
    } catch (error) {
      this.logger.error(`Skipping ${type} event for ${plural}`, { err: error })

      return
    }

    this.eventQueue.push(
      {
        event: {
          meta,
          type,
          object,
        },
        handler,
      },
      (error) => {
        if (error) {
          this.logger.error(`Unable to handle ${type} event for ${plural}`, { err: error })
        }
      }
    )
  }

  private async watchOnce(
    watch: Watch,
    uri: string,
    onEvent: (phase: string, object: KubernetesObject) => void
  ): Promise<void> {
    const { signal } = this.abortController

    return new Promise<void>((resolve, reject) => {
      let request: WatchRequest | undefined

      const onAbort = (): void => {
        request?.abort()
        resolve()
      }

      const done = (error: unknown): void => {
        signal.removeEventListener('abort', onAbort)

        if (error && !signal.aborted) {
          reject(error)
        } else {
          resolve()
        }
      }

      signal.addEventListener('abort', onAbort, { once: true })

      watch
        .watch(uri, {}, onEvent, done)
        .then((started: WatchRequest) => {
          request = started

          if (signal.aborted) {
            started.abort()
          }
        })
        .catch((error: unknown) => {
          signal.removeEventListener('abort', onAbort)
          reject(error)
        })
    })
  }
}
