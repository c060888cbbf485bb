import { KubernetesObject }                   from '@kubernetes/client-node'
import { V1HTTPIngressPath }                  from '@kubernetes/client-node'
import { V1Ingress }                          from '@kubernetes/client-node'
import { V1IngressRule }                      from '@kubernetes/client-node'
import { V1IngressServiceBackend }            from '@kubernetes/client-node'

import { ApplicationGatewayProtocol }         from '@appgw-ingress/gateway-api'
import { VirtualServiceHttp }                 from '@appgw-ingress/k8s-istio-api'
import { VirtualServiceHttpMatchRequest }     from '@appgw-ingress/k8s-istio-api'
import { VirtualServiceHttpRouteDestination } from '@appgw-ingress/k8s-istio-api'
import { VirtualServiceResource }             from '@appgw-ingress/k8s-istio-api'

import { HttpPort }                           from './config-builder.constants'
import { HttpsPort }                          from './config-builder.constants'

export const getNamespace = (object: KubernetesObject): string => object.metadata?.namespace || 'default'

export const getName = (object: KubernetesObject): string => object.metadata?.name ?? ''

export class ServiceIdentifier {
  constructor(
    public readonly namespace: string,
    public readonly name: string
  ) {}

  get serviceKey(): string {
    return `${this.namespace}/${this.name}`
  }

  get serviceFullName(): string {
    return `${this.namespace}-${this.name}`
  }

  equals(other: ServiceIdentifier): boolean {
    return this.namespace === other.namespace && this.name === other.name
  }
}

export class BackendIdentifier extends ServiceIdentifier {
  constructor(
    public readonly ingress: V1Ingress,
    public readonly rule: V1IngressRule | undefined,
    public readonly path: V1HTTPIngressPath | undefined,
    public readonly backend: V1IngressServiceBackend
  ) {
    super(getNamespace(ingress), backend.name)
  }

  get ingressName(): string {
    return getName(this.ingress)
  }

  get servicePort(): string {
    return String(this.backend.port?.number ?? this.backend.port?.name ?? '')
  }

  get owner(): KubernetesObject {
    return this.ingress
  }

  get key(): string {
    return [
      this.serviceKey,
      this.ingressName,
      this.rule?.host ?? '',
      this.path?.path ?? '',
      this.servicePort,
    ].join('|')
  }
}

export class ListenerIdentifier {
  constructor(
    public readonly frontendPort: number,
    public readonly hostName: string = ''
  ) {}

  get key(): string {
    return `${this.frontendPort}|${this.hostName}`
  }

  equals(other: ListenerIdentifier): boolean {
    return this.key === other.key
  }
}

export class IstioDestinationIdentifier extends ServiceIdentifier {
  constructor(
    public readonly virtualService: VirtualServiceResource,
    public readonly destination: VirtualServiceHttpRouteDestination
  ) {
    super(getNamespace(virtualService), destination.host)
  }

  get virtualServiceName(): string {
    return getName(this.virtualService)
  }

  get servicePort(): string {
    return String(this.destination.port?.number ?? '')
  }

  get owner(): KubernetesObject {
    return this.virtualService
  }

  get key(): string {
    return ['istio', this.serviceKey, this.virtualServiceName, this.servicePort].join('|')
  }
}

export class IstioMatchIdentifier {
  constructor(
    public readonly namespace: string,
    public readonly virtualService: VirtualServiceResource,
    public readonly route: VirtualServiceHttp,
    public readonly match: VirtualServiceHttpMatchRequest,
    public readonly destinations: Array<VirtualServiceHttpRouteDestination>,
    public readonly gateways: Array<string>
  ) {}

  get virtualServiceName(): string {
    return getName(this.virtualService)
  }
}

export type ResolvableBackendIdentifier = BackendIdentifier | IstioDestinationIdentifier

export const generateBackendId = (
  ingress: V1Ingress,
  rule: V1IngressRule | undefined,
  path: V1HTTPIngressPath | undefined,
  backend: V1IngressServiceBackend
): BackendIdentifier => new BackendIdentifier(ingress, rule, path, backend)

export const generateListenerId = (
  rule: V1IngressRule | undefined,
  protocol: ApplicationGatewayProtocol,
  overridePort?: number
): ListenerIdentifier => {
  const defaultPort = protocol === ApplicationGatewayProtocol.Https ? HttpsPort : HttpPort

  return new ListenerIdentifier(overridePort ?? defaultPort, rule?.host ?? '')
}

export const generateIstioMatchId = (
  virtualService: VirtualServiceResource,
  route: VirtualServiceHttp,
  match: VirtualServiceHttpMatchRequest,
  destinations: Array<VirtualServiceHttpRouteDestination>
): IstioMatchIdentifier =>
  new IstioMatchIdentifier(
    getNamespace(virtualService),
    virtualService,
    route,
    match,
    destinations,
    match.gateways ?? virtualService.spec.gateways ?? []
  )

export const generateIstioDestinationId = (
  virtualService: VirtualServiceResource,
  destination: VirtualServiceHttpRouteDestination
): IstioDestinationIdentifier => new IstioDestinationIdentifier(virtualService, destination)
