/* eslint-disable no-shadow */

export enum ProhibitedTargetResourceVersion {
  v1 = 'v1',
}

export enum ProhibitedTargetResourceKind {
  ProhibitedTarget = 'AzureIngressProhibitedTarget',
}

export enum ProhibitedTargetResourceGroup {
  ProhibitedTarget = 'azureingressprohibitedtargets',
}

export enum ProhibitedTargetDomain {
  Group = 'appgw.ingress.k8s.io',
}
