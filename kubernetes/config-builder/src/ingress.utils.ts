import { V1HTTPIngressPath }          from '@kubernetes/client-node'
import { V1Ingress }                  from '@kubernetes/client-node'
import { V1IngressRule }              from '@kubernetes/client-node'
import { V1IngressServiceBackend }    from '@kubernetes/client-node'

import { ApplicationGatewayProtocol } from '@appgw-ingress/gateway-api'
import { VirtualServiceResource }     from '@appgw-ingress/k8s-istio-api'
import { Target }                     from '@appgw-ingress/k8s-brownfield'
import { getTargetBlacklist }         from '@appgw-ingress/k8s-brownfield'
import { pruneIngressRules }          from '@appgw-ingress/k8s-brownfield'

import { ConfigBuilderContext }       from './config-builder.interfaces'
import { BackendIdentifier }          from './identifiers'
import { IstioDestinationIdentifier } from './identifiers'
import { ListenerIdentifier }         from './identifiers'
import { getOverrideFrontendPort }    from './annotations'
import { generateBackendId }          from './identifiers'
import { generateIstioDestinationId } from './identifiers'
import { generateListenerId }         from './identifiers'
import { getNamespace }               from './identifiers'
import { generateSslCertificateName } from './naming'
import { HttpPort }                   from './config-builder.constants'

export interface ListenerConfig {
  listenerId: ListenerIdentifier
  protocol: ApplicationGatewayProtocol
  sslCertificateName?: string
}

export interface IngressListenerRule {
  rule?: V1IngressRule
  config: ListenerConfig
}

export const getIngressRules = (ingress: V1Ingress, cbCtx: ConfigBuilderContext): Array<V1IngressRule> =>
  cbCtx.envVariables.enableBrownfieldDeployment
    ? pruneIngressRules(ingress, cbCtx.prohibitedTargets)
    : ingress.spec?.rules ?? []

// The host-less listener serves the ("", "") target, which only a universal prohibition claims.
export const isCatchAllListenerProhibited = (cbCtx: ConfigBuilderContext): boolean =>
  cbCtx.envVariables.enableBrownfieldDeployment &&
  new Target().isBlacklisted(getTargetBlacklist(cbCtx.prohibitedTargets))

export const getVirtualServices = (cbCtx: ConfigBuilderContext): Array<VirtualServiceResource> =>
  cbCtx.envVariables.enableIstioIntegration ? cbCtx.virtualServices ?? [] : []

export const getDefaultServiceBackend = (ingress: V1Ingress): V1IngressServiceBackend | undefined =>
  ingress.spec?.defaultBackend?.service

export const getTlsSecretName = (ingress: V1Ingress, host: string): string | undefined =>
  ingress.spec?.tls?.find((tls) => !tls.hosts || tls.hosts.length === 0 || tls.hosts.includes(host))
    ?.secretName

export const getListenerConfig = (ingress: V1Ingress, rule?: V1IngressRule): ListenerConfig => {
  const secretName = getTlsSecretName(ingress, rule?.host ?? '')
  const protocol = secretName ? ApplicationGatewayProtocol.Https : ApplicationGatewayProtocol.Http

  return {
    listenerId: generateListenerId(rule, protocol, getOverrideFrontendPort(ingress)),
    protocol,
    sslCertificateName: secretName ? generateSslCertificateName(getNamespace(ingress), secretName) : undefined,
  }
}

/**
 * Rules of the ingress paired with the listener they land on. An ingress with
 * only a default backend lands on the host-less listener.
 */
export const getIngressListenerRules = (
  ingress: V1Ingress,
  cbCtx: ConfigBuilderContext
): Array<IngressListenerRule> => {
  const rules = getIngressRules(ingress, cbCtx)

  if (rules.length === 0) {
    return getDefaultServiceBackend(ingress) && !isCatchAllListenerProhibited(cbCtx)
      ? [{ config: getListenerConfig(ingress) }]
      : []
  }

  return rules.map((rule) => ({ rule, config: getListenerConfig(ingress, rule) }))
}

export interface IngressPathPosition {
  ruleIndex: number
  pathIndex: number
}

// Positions in the ingress as written, so pruning never renumbers what remains.
export const getIngressPathPositions = (ingress: V1Ingress): Map<V1HTTPIngressPath, IngressPathPosition> => {
  const positions = new Map<V1HTTPIngressPath, IngressPathPosition>()
  const rules = ingress.spec?.rules ?? []

  rules.forEach((rule, ruleIndex) => {
    rule.http?.paths.forEach((path, pathIndex) => positions.set(path, { ruleIndex, pathIndex }))
  })

  return positions
}

export const getVirtualServiceListenerConfigs = (virtualService: VirtualServiceResource): Array<ListenerConfig> =>
  (virtualService.spec.hosts ?? []).map((host) => ({
    listenerId: new ListenerIdentifier(HttpPort, host),
    protocol: ApplicationGatewayProtocol.Http,
  }))

export const collectBackendIds = (cbCtx: ConfigBuilderContext): Array<BackendIdentifier> => {
  const backendIds = new Map<string, BackendIdentifier>()

  const add = (backendId: BackendIdentifier) => {
    if (!backendIds.has(backendId.key)) {
      backendIds.set(backendId.key, backendId)
    }
  }

  for (const ingress of cbCtx.ingressList) {
    const defaultBackend = getDefaultServiceBackend(ingress)
    const rules = getIngressRules(ingress, cbCtx)

    if (defaultBackend && (rules.length > 0 || !isCatchAllListenerProhibited(cbCtx))) {
      add(generateBackendId(ingress, undefined, undefined, defaultBackend))
    }

    for (const rule of rules) {
      for (const path of rule.http?.paths ?? []) {
        if (path.backend.service) {
          add(generateBackendId(ingress, rule, path, path.backend.service))
        }
      }
    }
  }

  return [...backendIds.values()]
}

export const collectIstioDestinationIds = (cbCtx: ConfigBuilderContext): Array<IstioDestinationIdentifier> => {
  const destinationIds = new Map<string, IstioDestinationIdentifier>()

  for (const virtualService of getVirtualServices(cbCtx)) {
    for (const http of virtualService.spec.http ?? []) {
      for (const route of http.route ?? []) {
        const destinationId = generateIstioDestinationId(virtualService, route.destination)

        if (!destinationIds.has(destinationId.key)) {
          destinationIds.set(destinationId.key, destinationId)
        }
      }
    }
  }

  return [...destinationIds.values()]
}

export const isCatchAllPath = (path?: string): boolean => !path || path === '/' || path === '/*'
