import { V1Endpoints }                 from '@kubernetes/client-node'
import { V1Ingress }                   from '@kubernetes/client-node'
import { V1Pod }                       from '@kubernetes/client-node'
import { V1Service }                   from '@kubernetes/client-node'

import { ProhibitedTargetResource }    from '@appgw-ingress/k8s-prohibited-target-api'
import { VirtualServiceResource }      from '@appgw-ingress/k8s-istio-api'

import { CacheLookupError }            from './k8s-context.errors'
import { ResourceStore }               from './resource.store'
import { isApplicationGatewayIngress } from './ingress-class'

export interface K8sContextCaches {
  ingresses: ResourceStore<V1Ingress>
  services: ResourceStore<V1Service>
  endpoints: ResourceStore<V1Endpoints>
  pods: ResourceStore<V1Pod>
  virtualServices: ResourceStore<VirtualServiceResource>
  prohibitedTargets: ResourceStore<ProhibitedTargetResource>
}

export class K8sContext {
  readonly caches: K8sContextCaches = {
    ingresses: new ResourceStore<V1Ingress>(),
    services: new ResourceStore<V1Service>(),
    endpoints: new ResourceStore<V1Endpoints>(),
    pods: new ResourceStore<V1Pod>(),
    virtualServices: new ResourceStore<VirtualServiceResource>(),
    prohibitedTargets: new ResourceStore<ProhibitedTargetResource>(),
  }

  private assertKey(key: string) {
    const [namespace, name, ...rest] = key.split('/')

    if (!namespace || !name || rest.length > 0) {
      throw new CacheLookupError(key)
    }
  }

  getEndpointsByService(serviceKey: string): V1Endpoints | undefined {
    this.assertKey(serviceKey)

    return this.caches.endpoints.get(serviceKey)
  }

  getService(serviceKey: string): V1Service | undefined {
    this.assertKey(serviceKey)

    return this.caches.services.get(serviceKey)
  }

  getPodsByServiceSelector(namespace: string, selector?: Record<string, string>): Array<V1Pod> {
    const entries = Object.entries(selector ?? {})

    if (entries.length === 0) {
      return []
    }

    return this.caches.pods
      .list()
      .filter(
        (pod) =>
          (pod.metadata?.namespace || 'default') === namespace &&
          entries.every(([key, value]) => pod.metadata?.labels?.[key] === value)
      )
  }

  listIngresses(): Array<V1Ingress> {
    return this.caches.ingresses.list().filter(isApplicationGatewayIngress)
  }

  listServices(): Array<V1Service> {
    return this.caches.services.list()
  }

  listVirtualServices(): Array<VirtualServiceResource> {
    return this.caches.virtualServices.list()
  }

  listProhibitedTargets(): Array<ProhibitedTargetResource> {
    return this.caches.prohibitedTargets.list()
  }
}
