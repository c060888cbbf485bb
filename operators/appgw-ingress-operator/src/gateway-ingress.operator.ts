import { KubeConfig }                      from '@kubernetes/client-node'
import { KubernetesObject }                from '@kubernetes/client-node'
import deepEqual                           from 'deep-equal'

import { ApplicationGateway }              from '@appgw-ingress/gateway-api'
import { ApplicationGatewayIdentifier }    from '@appgw-ingress/gateway-api'
import { BuildInfo }                       from '@appgw-ingress/k8s-config-builder'
import { ConfigBuilder }                   from '@appgw-ingress/k8s-config-builder'
import { ConfigBuilderContext }            from '@appgw-ingress/k8s-config-builder'
import { EnvVariables }                    from '@appgw-ingress/k8s-config-builder'
import { K8sContext }                      from '@appgw-ingress/k8s-context'
import { ResourceStore }                   from '@appgw-ingress/k8s-context'
import { EventReason }                     from '@appgw-ingress/k8s-event-recorder'
import { EventRecorder }                   from '@appgw-ingress/k8s-event-recorder'
import { EventType }                       from '@appgw-ingress/k8s-event-recorder'
import { KubernetesEventRecorder }         from '@appgw-ingress/k8s-event-recorder'
import { VirtualServiceDomain }            from '@appgw-ingress/k8s-istio-api'
import { VirtualServiceResourceGroup }     from '@appgw-ingress/k8s-istio-api'
import { VirtualServiceResourceVersion }   from '@appgw-ingress/k8s-istio-api'
import { Operator }                        from '@appgw-ingress/k8s-operator'
import { ResourceEventHandler }            from '@appgw-ingress/k8s-operator'
import { ResourceEventType }               from '@appgw-ingress/k8s-operator'
import { ProhibitedTargetDomain }          from '@appgw-ingress/k8s-prohibited-target-api'
import { ProhibitedTargetResourceGroup }   from '@appgw-ingress/k8s-prohibited-target-api'
import { ProhibitedTargetResourceVersion } from '@appgw-ingress/k8s-prohibited-target-api'

import { ArmGatewayClient }                from './arm-gateway.client'
import { GatewayClient }                   from './gateway-client.interfaces'
import { ResourceGuard }                   from './resource.guards'
import { isEndpoints }                     from './resource.guards'
import { isIngress }                       from './resource.guards'
import { isPod }                           from './resource.guards'
import { isProhibitedTarget }              from './resource.guards'
import { isService }                       from './resource.guards'
import { isVirtualService }                from './resource.guards'

// Gateways are compared as the JSON the management API exchanges.
const isSameConfiguration = (current: ApplicationGateway, next: ApplicationGateway): boolean =>
  deepEqual(JSON.parse(JSON.stringify(current)), JSON.parse(JSON.stringify(next)), { strict: true })

export interface GatewayIngressOperatorOptions {
  envVariables: EnvVariables
  buildInfo?: BuildInfo
  k8sContext?: K8sContext
  gatewayClient?: GatewayClient
  recorder?: EventRecorder
}

export class GatewayIngressOperator extends Operator {
  readonly k8sContext: K8sContext

  private readonly envVariables: EnvVariables

  private readonly buildInfo?: BuildInfo

  private readonly gatewayIdentifier: ApplicationGatewayIdentifier

  private readonly gatewayClient: GatewayClient

  private readonly recorder: EventRecorder

  constructor(options: GatewayIngressOperatorOptions, kubeConfig?: KubeConfig) {
    super(kubeConfig)

    const { envVariables } = options

    this.envVariables = envVariables
    this.buildInfo = options.buildInfo
    this.k8sContext = options.k8sContext ?? new K8sContext()
    this.gatewayIdentifier = new ApplicationGatewayIdentifier(
      envVariables.subscriptionId,
      envVariables.resourceGroupName,
      envVariables.gatewayName
    )
    this.gatewayClient =
      options.gatewayClient ??
      new ArmGatewayClient(this.gatewayIdentifier, {
        armEndpoint: envVariables.armEndpoint,
        accessToken: envVariables.armAccessToken,
      })
    this.recorder = options.recorder ?? new KubernetesEventRecorder(this.kubeConfig)
  }

  protected async init(): Promise<void> {
    const { caches } = this.k8sContext
    const { watchNamespace, enableIstioIntegration, enableBrownfieldDeployment } = this.envVariables

    const watches = [
      this.watchResource(
        'networking.k8s.io',
        'v1',
        'ingresses',
        this.syncResource(caches.ingresses, isIngress),
        watchNamespace
      ),
      this.watchResource('', 'v1', 'services', this.syncResource(caches.services, isService), watchNamespace),
      this.watchResource('', 'v1', 'endpoints', this.syncResource(caches.endpoints, isEndpoints), watchNamespace),
      this.watchResource('', 'v1', 'pods', this.syncResource(caches.pods, isPod), watchNamespace),
    ]

    if (enableIstioIntegration) {
      watches.push(
        this.watchResource(
          VirtualServiceDomain.Group,
          VirtualServiceResourceVersion.v1alpha3,
          VirtualServiceResourceGroup.VirtualService,
          this.syncResource(caches.virtualServices, isVirtualService),
          watchNamespace
        )
      )
    }

    if (enableBrownfieldDeployment) {
      watches.push(
        this.watchResource(
          ProhibitedTargetDomain.Group,
          ProhibitedTargetResourceVersion.v1,
          ProhibitedTargetResourceGroup.ProhibitedTarget,
          this.syncResource(caches.prohibitedTargets, isProhibitedTarget),
          watchNamespace
        )
      )
    }

    await Promise.all(watches)
  }

  protected syncResource<T extends KubernetesObject>(
    store: ResourceStore<T>,
    guard: ResourceGuard<T>
  ): ResourceEventHandler {
    return async (event) => {
      const { object } = event

      if (!guard(object)) {
        this.logger.warn(`Unexpected ${object.kind} object in ${event.meta.id} watch`)

        return
      }

      if (event.type === ResourceEventType.Deleted) {
        store.delete(object)
      } else {
        store.add(object)
      }

      await this.reconcile()
    }
  }

  async reconcile(): Promise<void> {
    const { envVariables } = this
    const cbCtx: ConfigBuilderContext = {
      ingressList: this.k8sContext.listIngresses(),
      serviceList: this.k8sContext.listServices(),
      virtualServices: envVariables.enableIstioIntegration ? this.k8sContext.listVirtualServices() : [],
      envVariables,
      prohibitedTargets: envVariables.enableBrownfieldDeployment
        ? this.k8sContext.listProhibitedTargets()
        : [],
    }

    try {
      const original = await this.gatewayClient.get()

      const builder = new ConfigBuilder(
        this.k8sContext,
        this.gatewayIdentifier,
        original,
        this.recorder,
        { buildInfo: this.buildInfo }
      )

      builder.preBuildValidate(cbCtx)

      const generated = builder.build(cbCtx)

      builder.postBuildValidate(cbCtx, generated)

      if (isSameConfiguration(original, generated)) {
        this.logger.debug(`Application gateway ${envVariables.gatewayName} is up to date`)

        return
      }

      await this.gatewayClient.update(generated)

      this.logger.info(`Applied configuration to application gateway ${envVariables.gatewayName}`)

      cbCtx.ingressList.forEach((ingress) => {
        this.recorder.event(
          ingress,
          EventType.Normal,
          EventReason.ConfigurationApplied,
          `Applied to application gateway ${envVariables.gatewayName}`
        )
      })
    } catch (error) {
      this.logger.error(`Unable to reconcile application gateway ${envVariables.gatewayName}`, {
        err: error,
      })
    }
  }
}
