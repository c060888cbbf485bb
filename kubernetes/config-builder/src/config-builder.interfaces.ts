import { V1Ingress }                          from '@kubernetes/client-node'
import { V1Service }                          from '@kubernetes/client-node'

import { ApplicationGatewayIdentifier }       from '@appgw-ingress/gateway-api'
import { ApplicationGatewayPropertiesFormat } from '@appgw-ingress/gateway-api'
import { ExistingResources }                  from '@appgw-ingress/k8s-brownfield'
import { K8sContext }                         from '@appgw-ingress/k8s-context'
import { EventRecorder }                      from '@appgw-ingress/k8s-event-recorder'
import { ProhibitedTargetResource }           from '@appgw-ingress/k8s-prohibited-target-api'
import { VirtualServiceResource }             from '@appgw-ingress/k8s-istio-api'

import { EnvVariables }                       from './environment'
import { BuildInfo }                          from './version'

export interface ConfigBuilderContext {
  ingressList: Array<V1Ingress>
  serviceList: Array<V1Service>
  virtualServices?: Array<VirtualServiceResource>
  envVariables: EnvVariables
  prohibitedTargets: Array<ProhibitedTargetResource>
}

export interface StageContext {
  k8sContext: K8sContext
  gatewayIdentifier: ApplicationGatewayIdentifier
  recorder: EventRecorder
  existing?: ExistingResources
}

export interface ConfigBuilderOptions {
  buildInfo?: BuildInfo
  preBuildValidators?: Array<Validator>
  postBuildValidators?: Array<Validator>
}

export interface ValidationContext {
  recorder: EventRecorder
  properties: ApplicationGatewayPropertiesFormat
  envVariables: EnvVariables
  ingressList: Array<V1Ingress>
  serviceList: Array<V1Service>
}

export interface Validator {
  readonly name: string
  validate(context: ValidationContext): void
}
