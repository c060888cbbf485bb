export const AGPrefix = 'k8s-ag-ingress-'

export const MaxNameSuffixLength = 80

export const DefaultProbeName = `${AGPrefix}defaultprobe`

export const DefaultBackendHttpSettingsName = `${AGPrefix}defaulthttpsetting`

export const DefaultBackendAddressPoolName = `${AGPrefix}defaultaddresspool`

export const DefaultProbeInterval = 30

export const DefaultProbeTimeout = 30

export const DefaultProbeUnhealthyThreshold = 3

export const DefaultRequestTimeout = 30

export const HttpPort = 80

export const HttpsPort = 443

export const ManagedByK8sIngressTag = 'managed-by-k8s-ingress'

export const GatewayCollectionLimit = 100
