import { createHash }                  from 'node:crypto'

import { AGPrefix }                    from './config-builder.constants'
import { MaxNameSuffixLength }         from './config-builder.constants'
import { BackendIdentifier }           from './identifiers'
import { IstioDestinationIdentifier }  from './identifiers'
import { IstioMatchIdentifier }        from './identifiers'
import { ListenerIdentifier }          from './identifiers'
import { ResolvableBackendIdentifier } from './identifiers'

export const formatPropName = (suffix: string): string => {
  const sanitized = suffix.replace(/[^A-Za-z0-9._-]/g, '-')

  if (sanitized.length <= MaxNameSuffixLength) {
    return sanitized
  }

  const hash = createHash('md5').update(sanitized).digest('hex')

  return `${sanitized.slice(0, MaxNameSuffixLength - hash.length - 1)}-${hash}`
}

const withPrefix = (suffix: string): string => `${AGPrefix}${formatPropName(suffix)}`

const getListenerSuffix = ({ frontendPort, hostName }: ListenerIdentifier): string =>
  hostName ? `${hostName}-${frontendPort}` : String(frontendPort)

export const generateProbeName = (backendId: BackendIdentifier): string =>
  withPrefix(`pb-${backendId.serviceFullName}-${backendId.servicePort}-${backendId.ingressName}`)

export const generateHttpSettingsName = (
  backendId: ResolvableBackendIdentifier,
  backendPort: number
): string => {
  if (backendId instanceof IstioDestinationIdentifier) {
    return withPrefix(
      `bp-istio-${backendId.serviceFullName}-${backendId.servicePort}-${backendPort}-${backendId.virtualServiceName}`
    )
  }

  return withPrefix(
    `bp-${backendId.serviceFullName}-${backendId.servicePort}-${backendPort}-${backendId.ingressName}`
  )
}

export const generateAddressPoolName = (
  backendId: ResolvableBackendIdentifier,
  servicePort: number,
  backendPort: number
): string => {
  const kind = backendId instanceof IstioDestinationIdentifier ? 'pool-istio' : 'pool'

  return withPrefix(`${kind}-${backendId.serviceFullName}-${servicePort}-bp-${backendPort}`)
}

export const generateFrontendPortName = (port: number): string => withPrefix(`fp-${port}`)

export const generateListenerName = (listenerId: ListenerIdentifier): string =>
  withPrefix(`fl-${getListenerSuffix(listenerId)}`)

export const generateUrlPathMapName = (listenerId: ListenerIdentifier): string =>
  withPrefix(`url-${getListenerSuffix(listenerId)}`)

export const generateRequestRoutingRuleName = (listenerId: ListenerIdentifier): string =>
  withPrefix(`rr-${getListenerSuffix(listenerId)}`)

export const generatePathRuleName = (
  namespace: string,
  ingressName: string,
  ruleIndex: number,
  pathIndex: number
): string => withPrefix(`pr-${namespace}-${ingressName}-${ruleIndex}-${pathIndex}`)

export const generateIstioPathRuleName = (
  matchId: IstioMatchIdentifier,
  routeIndex: number,
  matchIndex: number
): string =>
  withPrefix(`pr-istio-${matchId.namespace}-${matchId.virtualServiceName}-${routeIndex}-${matchIndex}`)

export const generateSslCertificateName = (namespace: string, secretName: string): string =>
  withPrefix(`cert-${namespace}-${secretName}`)
