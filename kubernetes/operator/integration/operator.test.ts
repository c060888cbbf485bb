/* eslint-disable max-classes-per-file */

import { KubeConfig }           from '@kubernetes/client-node'
import { KubernetesObject }     from '@kubernetes/client-node'

import { Operator }             from '../src/operator'
import { ResourceEventType }    from '../src/operator.enums'
import { ResourceEvent }        from '../src/operator.interfaces'
import { ResourceEventHandler } from '../src/operator.interfaces'

class DispatchOperator extends Operator {
  protected async init(): Promise<void> {}

  emit(phase: string, object: KubernetesObject, handler: ResourceEventHandler) {
    this.dispatch('namespaces', phase, object, handler)
  }

  async drained(): Promise<void> {
    if (!this.eventQueue.idle()) {
      await this.eventQueue.drain()
    }
  }
}

const newKubeConfig = (): KubeConfig => {
  const kubeConfig = new KubeConfig()

  kubeConfig.loadFromOptions({
    clusters: [{ name: 'test', server: 'http://127.0.0.1:6443', skipTLSVerify: true }],
    users: [{ name: 'test' }],
    contexts: [{ name: 'test', cluster: 'test', user: 'test' }],
    currentContext: 'test',
  })

  return kubeConfig
}

const namespace = (name: string): KubernetesObject => ({
  apiVersion: 'v1',
  kind: 'Namespace',
  metadata: { name, resourceVersion: '1' },
})

describe('operator', () => {
  let operator: DispatchOperator

  beforeEach(() => {
    operator = new DispatchOperator(newKubeConfig())
  })

  it('should handle events one at a time in arrival order', async () => {
    const log: string[] = []
    const onEvent = async (event: ResourceEvent) => {
      log.push(`start ${event.meta.name}`)
      await new Promise<void>((resolve) => {
        setTimeout(resolve, 5)
      })
      log.push(`end ${event.meta.name}`)
    }

    operator.emit('ADDED', namespace('first'), onEvent)
    operator.emit('MODIFIED', namespace('second'), onEvent)

    await operator.drained()

    expect(log).toEqual(['start first', 'end first', 'start second', 'end second'])
  })

  it('should build event meta from the watched object', async () => {
    const onEvent = jest.fn(async () => {})

    operator.emit('DELETED', namespace('first'), onEvent)

    await operator.drained()

    expect(onEvent).toHaveBeenCalledWith({
      meta: expect.objectContaining({
        id: 'namespaces.v1',
        name: 'first',
        resourceVersion: '1',
        kind: 'Namespace',
      }),
      type: ResourceEventType.Deleted,
      object: namespace('first'),
    })
  })

  it('should skip bookmark and error events', async () => {
    const onEvent = jest.fn(async () => {})

    operator.emit('BOOKMARK', namespace('first'), onEvent)
    operator.emit('ERROR', namespace('first'), onEvent)

    await operator.drained()

    expect(onEvent).not.toHaveBeenCalled()
  })

  it('should skip malformed objects', async () => {
    const onEvent = jest.fn(async () => {})

    operator.emit('ADDED', { apiVersion: 'v1', kind: 'Namespace', metadata: {} }, onEvent)

    await operator.drained()

    expect(onEvent).not.toHaveBeenCalled()
  })

  it('should keep handling events after a failed handler', async () => {
    const handled: string[] = []
    const onEvent = async (event: ResourceEvent) => {
      if (event.meta.name === 'broken') {
        throw new Error('handler failed')
      }

      handled.push(event.meta.name)
    }

    operator.emit('ADDED', namespace('broken'), onEvent)
    operator.emit('ADDED', namespace('healthy'), onEvent)

    await operator.drained()

    expect(handled).toEqual(['healthy'])
  })
})
