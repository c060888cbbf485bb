import { KubernetesObject } from '@kubernetes/client-node'

export interface ProhibitedTargetSpec {
  hostname?: string
  paths?: Array<string>
}

export interface ProhibitedTargetResource extends KubernetesObject {
  spec: ProhibitedTargetSpec
}
