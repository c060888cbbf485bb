/* eslint-disable max-classes-per-file */

import { KubeConfig }                        from '@kubernetes/client-node'
import { KubernetesObject }                  from '@kubernetes/client-node'
import { V1Ingress }                         from '@kubernetes/client-node'

import { ApplicationGateway }                from '@appgw-ingress/gateway-api'
import { DefaultArmEndpoint }                from '@appgw-ingress/k8s-config-builder'
import { EnvVariables }                      from '@appgw-ingress/k8s-config-builder'
import { K8sContext }                        from '@appgw-ingress/k8s-context'
import { ResourceEventType }                 from '@appgw-ingress/k8s-operator'
import { FakeEventRecorder }                 from '@appgw-ingress/k8s-test-utils'
import { GatewayName }                       from '@appgw-ingress/k8s-test-utils'
import { ResourceGroup }                     from '@appgw-ingress/k8s-test-utils'
import { SubscriptionId }                    from '@appgw-ingress/k8s-test-utils'
import { newEmptyApplicationGatewayFixture } from '@appgw-ingress/k8s-test-utils'
import { newEndpointsFixture }               from '@appgw-ingress/k8s-test-utils'
import { newIngressFixture }                 from '@appgw-ingress/k8s-test-utils'
import { newPodFixture }                     from '@appgw-ingress/k8s-test-utils'
import { newServiceFixture }                 from '@appgw-ingress/k8s-test-utils'

import { GatewayClient }                     from '../src'
import { GatewayIngressOperator }            from '../src'
import { isIngress }                         from '../src'

class FakeGatewayClient implements GatewayClient {
  readonly updates: Array<ApplicationGateway> = []

  failure?: Error

  copy = (gateway: ApplicationGateway): ApplicationGateway => JSON.parse(JSON.stringify(gateway))

  constructor(private gateway: ApplicationGateway) {}

  async get(): Promise<ApplicationGateway> {
    if (this.failure) {
      throw this.failure
    }

    return this.copy(this.gateway)
  }

  async update(gateway: ApplicationGateway): Promise<ApplicationGateway> {
    this.updates.push(gateway)
    this.gateway = this.copy(gateway)

    return gateway
  }
}

class TestGatewayIngressOperator extends GatewayIngressOperator {
  async applyIngress(type: ResourceEventType, object: KubernetesObject): Promise<void> {
    await this.syncResource(
      this.k8sContext.caches.ingresses,
      isIngress
    )({
      meta: {
        id: 'ingresses.networking.k8s.io/v1',
        name: object.metadata?.name ?? '',
        resourceVersion: '1',
        apiVersion: object.apiVersion ?? '',
        kind: object.kind ?? '',
      },
      type,
      object,
    })
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

const envVariables: EnvVariables = {
  subscriptionId: SubscriptionId,
  resourceGroupName: ResourceGroup,
  gatewayName: GatewayName,
  usePrivateIp: false,
  enableBrownfieldDeployment: false,
  enableIstioIntegration: false,
  armEndpoint: DefaultArmEndpoint,
}

const buildInfo = { version: 'v1.0.0', gitCommit: 'abc123', buildDate: '2026-10-19' }

const names = (items?: Array<{ name: string }>): Array<string> => (items ?? []).map((item) => item.name)

describe('appgw-ingress-operator', () => {
  describe('reconcile', () => {
    let k8sContext: K8sContext
    let gatewayClient: FakeGatewayClient
    let recorder: FakeEventRecorder
    let operator: TestGatewayIngressOperator

    beforeEach(() => {
      k8sContext = new K8sContext()
      k8sContext.caches.services.add(newServiceFixture())
      k8sContext.caches.endpoints.add(newEndpointsFixture())
      k8sContext.caches.pods.add(newPodFixture())

      gatewayClient = new FakeGatewayClient(newEmptyApplicationGatewayFixture())
      recorder = new FakeEventRecorder()
      operator = new TestGatewayIngressOperator(
        { envVariables, buildInfo, k8sContext, gatewayClient, recorder },
        newKubeConfig()
      )
    })

    it('should apply generated configuration to gateway', async () => {
      k8sContext.caches.ingresses.add(newIngressFixture())

      await operator.reconcile()

      expect(gatewayClient.updates).toHaveLength(1)
      expect(names(gatewayClient.updates[0].properties.httpListeners)).toEqual([
        'k8s-ag-ingress-fl-bye.com-80',
        'k8s-ag-ingress-fl-hello.com-80',
      ])
      expect(gatewayClient.updates[0].tags).toEqual({
        'managed-by-k8s-ingress': 'v1.0.0/abc123/2026-10-19',
      })
      expect(recorder.events).toEqual([
        {
          object: newIngressFixture(),
          type: 'Normal',
          reason: 'ConfigurationApplied',
          message: `Applied to application gateway ${GatewayName}`,
        },
      ])
    })

    it('should skip update when gateway is up to date', async () => {
      k8sContext.caches.ingresses.add(newIngressFixture())

      await operator.reconcile()
      await operator.reconcile()

      expect(gatewayClient.updates).toHaveLength(1)
      expect(recorder.reasons).toEqual(['ConfigurationApplied'])
    })

    it('should compare gateway configuration by value', async () => {
      gatewayClient.copy = (gateway) => structuredClone(gateway)
      k8sContext.caches.ingresses.add(newIngressFixture())

      await operator.reconcile()
      await operator.reconcile()

      expect(gatewayClient.updates).toHaveLength(1)
    })

    it('should not update gateway when validation fails', async () => {
      const ingress = newIngressFixture()

      ingress.spec?.rules?.forEach((rule) => {
        // eslint-disable-next-line no-param-reassign
        rule.host = '*.bye.com'
      })

      k8sContext.caches.ingresses.add(ingress)

      await operator.reconcile()

      expect(gatewayClient.updates).toHaveLength(0)
      expect(recorder.reasons).toEqual(['InvalidIngress'])
    })

    it('should survive gateway client failures', async () => {
      gatewayClient.failure = new Error(`unable to get application gateway ${GatewayName}`)

      await expect(operator.reconcile()).resolves.toBeUndefined()

      expect(gatewayClient.updates).toHaveLength(0)
      expect(recorder.events).toEqual([])
    })

    it('should sync ingress events into cache before reconciling', async () => {
      await operator.applyIngress(ResourceEventType.Added, newIngressFixture())

      expect(k8sContext.listIngresses()).toEqual([newIngressFixture()])
      expect(names(gatewayClient.updates[0].properties.httpListeners)).toEqual([
        'k8s-ag-ingress-fl-bye.com-80',
        'k8s-ag-ingress-fl-hello.com-80',
      ])

      await operator.applyIngress(ResourceEventType.Deleted, newIngressFixture())

      expect(k8sContext.listIngresses()).toEqual([])
      expect(gatewayClient.updates).toHaveLength(2)
      expect(names(gatewayClient.updates[1].properties.httpListeners)).toEqual(['k8s-ag-ingress-fl-80'])
    })

    it('should ignore objects of unexpected kind', async () => {
      const ingress: V1Ingress = { ...newIngressFixture(), kind: 'Service' }

      await operator.applyIngress(ResourceEventType.Added, ingress)

      expect(k8sContext.caches.ingresses.size).toBe(0)
      expect(gatewayClient.updates).toHaveLength(0)
    })
  })
})
