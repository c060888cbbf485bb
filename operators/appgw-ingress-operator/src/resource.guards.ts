import { KubernetesObject }             from '@kubernetes/client-node'
import { V1Endpoints }                  from '@kubernetes/client-node'
import { V1Ingress }                    from '@kubernetes/client-node'
import { V1Pod }                        from '@kubernetes/client-node'
import { V1Service }                    from '@kubernetes/client-node'

import { ProhibitedTargetResource }     from '@appgw-ingress/k8s-prohibited-target-api'
import { ProhibitedTargetResourceKind } from '@appgw-ingress/k8s-prohibited-target-api'
import { VirtualServiceResource }       from '@appgw-ingress/k8s-istio-api'
import { VirtualServiceResourceKind }   from '@appgw-ingress/k8s-istio-api'

export type ResourceGuard<T extends KubernetesObject> = (object: KubernetesObject) => object is T

export const isIngress: ResourceGuard<V1Ingress> = (object): object is V1Ingress =>
  object.kind === 'Ingress'

export const isService: ResourceGuard<V1Service> = (object): object is V1Service =>
  object.kind === 'Service'

export const isEndpoints: ResourceGuard<V1Endpoints> = (object): object is V1Endpoints =>
  object.kind === 'Endpoints'

export const isPod: ResourceGuard<V1Pod> = (object): object is V1Pod => object.kind === 'Pod'

export const isVirtualService: ResourceGuard<VirtualServiceResource> = (
  object
): object is VirtualServiceResource =>
  object.kind === VirtualServiceResourceKind.VirtualService && 'spec' in object

export const isProhibitedTarget: ResourceGuard<ProhibitedTargetResource> = (
  object
): object is ProhibitedTargetResource =>
  object.kind === ProhibitedTargetResourceKind.ProhibitedTarget && 'spec' in object
