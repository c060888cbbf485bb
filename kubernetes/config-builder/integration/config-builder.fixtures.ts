import { K8sContext }           from '@appgw-ingress/k8s-context'
import { GatewayName }          from '@appgw-ingress/k8s-test-utils'
import { ResourceGroup }        from '@appgw-ingress/k8s-test-utils'
import { SubscriptionId }       from '@appgw-ingress/k8s-test-utils'
import { newEndpointsFixture }  from '@appgw-ingress/k8s-test-utils'
import { newIngressFixture }    from '@appgw-ingress/k8s-test-utils'
import { newPodFixture }        from '@appgw-ingress/k8s-test-utils'
import { newServiceFixture }    from '@appgw-ingress/k8s-test-utils'

import { ConfigBuilderContext } from '../src/config-builder.interfaces'
import { DefaultArmEndpoint }   from '../src/environment'
import { EnvVariables }         from '../src/environment'
import { BuildInfo }            from '../src/version'

export const newEnvVariablesFixture = (overrides: Partial<EnvVariables> = {}): EnvVariables => ({
  subscriptionId: SubscriptionId,
  resourceGroupName: ResourceGroup,
  gatewayName: GatewayName,
  usePrivateIp: false,
  enableBrownfieldDeployment: false,
  enableIstioIntegration: false,
  armEndpoint: DefaultArmEndpoint,
  ...overrides,
})

export const newBuildInfoFixture = (): BuildInfo => ({
  version: 'v1.0.0',
  gitCommit: 'abc123',
  buildDate: '2026-10-19',
})

export const newK8sContextFixture = (): K8sContext => {
  const k8sContext = new K8sContext()

  k8sContext.caches.ingresses.add(newIngressFixture())
  k8sContext.caches.services.add(newServiceFixture())
  k8sContext.caches.endpoints.add(newEndpointsFixture())
  k8sContext.caches.pods.add(newPodFixture())

  return k8sContext
}

export const newConfigBuilderContextFixture = (
  k8sContext: K8sContext,
  envVariables: Partial<EnvVariables> = {}
): ConfigBuilderContext => ({
  ingressList: k8sContext.listIngresses(),
  serviceList: k8sContext.listServices(),
  virtualServices: k8sContext.listVirtualServices(),
  envVariables: newEnvVariablesFixture(envVariables),
  prohibitedTargets: k8sContext.listProhibitedTargets(),
})
