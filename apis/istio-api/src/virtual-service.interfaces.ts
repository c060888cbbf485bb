import { KubernetesObject } from '@kubernetes/client-node'

export interface VirtualServiceStringMatch {
  exact?: string
  prefix?: string
  regex?: string
}

export interface VirtualServiceHttpMatchRequest {
  name?: string
  uri?: VirtualServiceStringMatch
  gateways?: Array<string>
  port?: number
}

export interface VirtualServiceHttpRouteDestinationPort {
  number: number
}

export interface VirtualServiceHttpRouteDestination {
  host: string
  subset?: string
  port?: VirtualServiceHttpRouteDestinationPort
}

export interface VirtualServiceHttpRoute {
  destination: VirtualServiceHttpRouteDestination
  weight?: number
}

export interface VirtualServiceHttp {
  name?: string
  match?: Array<VirtualServiceHttpMatchRequest>
  route: Array<VirtualServiceHttpRoute>
}

export interface VirtualServiceSpec {
  http: Array<VirtualServiceHttp>
  gateways: Array<string>
  hosts: Array<string>
}

export interface VirtualServiceResource extends KubernetesObject {
  spec: VirtualServiceSpec
}
