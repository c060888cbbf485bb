import { V1Ingress }                  from '@kubernetes/client-node'

import { ApplicationGatewayProtocol } from '@appgw-ingress/gateway-api'

export const AnnotationPrefix = 'appgw.ingress.kubernetes.io'

export const BackendPathPrefixKey = `${AnnotationPrefix}/backend-path-prefix`

export const CookieBasedAffinityKey = `${AnnotationPrefix}/cookie-based-affinity`

export const RequestTimeoutKey = `${AnnotationPrefix}/request-timeout`

export const BackendProtocolKey = `${AnnotationPrefix}/backend-protocol`

export const OverrideFrontendPortKey = `${AnnotationPrefix}/override-frontend-port`

const getAnnotation = (ingress: V1Ingress, key: string): string | undefined =>
  ingress.metadata?.annotations?.[key]?.trim() || undefined

const parsePositiveInt = (value?: string): number | undefined => {
  if (!value || !/^\d+$/.test(value)) {
    return undefined
  }

  const parsed = Number(value)

  return parsed > 0 ? parsed : undefined
}

export const getBackendPathPrefix = (ingress: V1Ingress): string | undefined =>
  getAnnotation(ingress, BackendPathPrefixKey)

export const isCookieBasedAffinity = (ingress: V1Ingress): boolean =>
  getAnnotation(ingress, CookieBasedAffinityKey)?.toLowerCase() === 'true'

export const getRequestTimeout = (ingress: V1Ingress): number | undefined =>
  parsePositiveInt(getAnnotation(ingress, RequestTimeoutKey))

export const getBackendProtocol = (ingress: V1Ingress): ApplicationGatewayProtocol | undefined => {
  switch (getAnnotation(ingress, BackendProtocolKey)?.toLowerCase()) {
    case 'http':
      return ApplicationGatewayProtocol.Http
    case 'https':
      return ApplicationGatewayProtocol.Https
    default:
      return undefined
  }
}

export const getOverrideFrontendPort = (ingress: V1Ingress): number | undefined => {
  const port = parsePositiveInt(getAnnotation(ingress, OverrideFrontendPortKey))

  return port !== undefined && port <= 65535 ? port : undefined
}
