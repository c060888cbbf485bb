/* eslint-disable no-shadow */

export enum VirtualServiceResourceVersion {
  v1alpha3 = 'v1alpha3',
}

export enum VirtualServiceResourceKind {
  VirtualService = 'VirtualService',
}

export enum VirtualServiceResourceGroup {
  VirtualService = 'virtualservices',
}

export enum VirtualServiceDomain {
  Group = 'networking.istio.io',
}
