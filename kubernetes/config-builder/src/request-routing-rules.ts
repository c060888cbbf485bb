import { V1Ingress }                                from '@kubernetes/client-node'

import { ApplicationGateway }                       from '@appgw-ingress/gateway-api'
import { ApplicationGatewayPathRule }               from '@appgw-ingress/gateway-api'
import { ApplicationGatewayRequestRoutingRule }     from '@appgw-ingress/gateway-api'
import { ApplicationGatewayRequestRoutingRuleType } from '@appgw-ingress/gateway-api'
import { ApplicationGatewayUrlPathMap }             from '@appgw-ingress/gateway-api'
import { SubResource }                              from '@appgw-ingress/gateway-api'
import { VirtualServiceHttpMatchRequest }           from '@appgw-ingress/k8s-istio-api'
import { VirtualServiceResource }                   from '@appgw-ingress/k8s-istio-api'
import { Logger }                                   from '@appgw-ingress/logger'
import { compareByName }                            from '@appgw-ingress/k8s-brownfield'
import { mergeByName }                              from '@appgw-ingress/k8s-brownfield'

import { ConfigBuilderContext }                     from './config-builder.interfaces'
import { StageContext }                             from './config-builder.interfaces'
import { BackendAddressPoolsResult }                from './backend-address-pools'
import { BackendHttpSettingsResult }                from './backend-http-settings'
import { DefaultBackendAddressPoolName }            from './config-builder.constants'
import { DefaultBackendHttpSettingsName }           from './config-builder.constants'
import { FrontendListenersResult }                  from './frontend-listeners'
import { ListenerIdentifier }                       from './identifiers'
import { generateBackendId }                        from './identifiers'
import { generateIstioDestinationId }               from './identifiers'
import { generateIstioMatchId }                     from './identifiers'
import { generateIstioPathRuleName }                from './naming'
import { generatePathRuleName }                     from './naming'
import { generateRequestRoutingRuleName }           from './naming'
import { generateUrlPathMapName }                   from './naming'
import { getDefaultServiceBackend }                 from './ingress.utils'
import { getIngressListenerRules }                  from './ingress.utils'
import { getIngressPathPositions }                  from './ingress.utils'
import { getName }                                  from './identifiers'
import { getNamespace }                             from './identifiers'
import { getVirtualServiceListenerConfigs }         from './ingress.utils'
import { getVirtualServices }                       from './ingress.utils'
import { isCatchAllPath }                           from './ingress.utils'

interface BackendReferences {
  pool: SubResource
  settings: SubResource
}

interface PathRuleConfig {
  name: string
  paths: Array<string>
  backend: BackendReferences
}

interface PathMapConfig {
  defaultBackend: BackendReferences
  pathRules: Map<string, PathRuleConfig>
}

const logger = new Logger('RequestRoutingRules')

const getIstioMatchPath = ({ uri }: VirtualServiceHttpMatchRequest): string | undefined => {
  if (uri?.exact !== undefined) {
    return uri.exact
  }

  if (uri?.prefix !== undefined) {
    return uri.prefix.endsWith('*') ? uri.prefix : `${uri.prefix}*`
  }

  return undefined
}

class PathMapCollector {
  private readonly pathMaps = new Map<string, PathMapConfig>()

  constructor(
    private readonly defaultBackend: BackendReferences,
    private readonly settings: BackendHttpSettingsResult,
    private readonly pools: BackendAddressPoolsResult
  ) {}

  get(listenerId: ListenerIdentifier): PathMapConfig {
    const existing = this.pathMaps.get(listenerId.key)

    if (existing) {
      return existing
    }

    const pathMap: PathMapConfig = { defaultBackend: this.defaultBackend, pathRules: new Map() }

    this.pathMaps.set(listenerId.key, pathMap)

    return pathMap
  }

  getBackendReferences(backendKey: string): BackendReferences {
    const pool = this.pools.poolsByBackend.get(backendKey)
    const settings = this.settings.resolvedBackends.get(backendKey)?.settings

    return {
      pool: pool ? { id: pool.id } : this.defaultBackend.pool,
      settings: settings ? { id: settings.id } : this.defaultBackend.settings,
    }
  }

  addIngress(ingress: V1Ingress, cbCtx: ConfigBuilderContext) {
    const namespace = getNamespace(ingress)
    const ingressName = getName(ingress)
    const defaultServiceBackend = getDefaultServiceBackend(ingress)
    const positions = getIngressPathPositions(ingress)

    getIngressListenerRules(ingress, cbCtx).forEach(({ rule, config }) => {
      const pathMap = this.get(config.listenerId)

      if (defaultServiceBackend) {
        pathMap.defaultBackend = this.getBackendReferences(
          generateBackendId(ingress, undefined, undefined, defaultServiceBackend).key
        )
      }

      rule?.http?.paths.forEach((path) => {
        const position = positions.get(path)

        if (!path.backend.service || !position) {
          return
        }

        const backend = this.getBackendReferences(
          generateBackendId(ingress, rule, path, path.backend.service).key
        )

        if (isCatchAllPath(path.path)) {
          pathMap.defaultBackend = backend
        } else {
          const name = generatePathRuleName(namespace, ingressName, position.ruleIndex, position.pathIndex)

          pathMap.pathRules.set(name, { name, paths: [path.path ?? ''], backend })
        }
      })
    })
  }

  addVirtualService(virtualService: VirtualServiceResource) {
    const listenerConfigs = getVirtualServiceListenerConfigs(virtualService)

    const routes = virtualService.spec.http ?? []

    routes.forEach((http, routeIndex) => {
      const [route] = http.route ?? []

      if (!route) {
        return
      }

      const backend = this.getBackendReferences(generateIstioDestinationId(virtualService, route.destination).key)
      const matches = http.match ?? []

      for (const { listenerId } of listenerConfigs) {
        const pathMap = this.get(listenerId)

        if (matches.length === 0) {
          pathMap.defaultBackend = backend
        }

        matches.forEach((match, matchIndex) => {
          const path = getIstioMatchPath(match)

          if (path === undefined) {
            logger.warn('Skipping virtual service match without uri prefix or exact value', {
              virtualService: getName(virtualService),
              routeIndex,
              matchIndex,
            })

            return
          }

          if (isCatchAllPath(path)) {
            pathMap.defaultBackend = backend
            return
          }

          const matchId = generateIstioMatchId(
            virtualService,
            http,
            match,
            http.route.map((httpRoute) => httpRoute.destination)
          )
          const name = generateIstioPathRuleName(matchId, routeIndex, matchIndex)

          pathMap.pathRules.set(name, { name, paths: [path], backend })
        })
      }
    })
  }
}

export const generateRequestRoutingRules = (
  stage: StageContext,
  gateway: ApplicationGateway,
  cbCtx: ConfigBuilderContext,
  settings: BackendHttpSettingsResult,
  pools: BackendAddressPoolsResult,
  listeners: FrontendListenersResult
): void => {
  const { gatewayIdentifier } = stage
  const collector = new PathMapCollector(
    {
      pool: { id: gatewayIdentifier.addressPoolId(DefaultBackendAddressPoolName) },
      settings: { id: gatewayIdentifier.httpSettingsId(DefaultBackendHttpSettingsName) },
    },
    settings,
    pools
  )

  cbCtx.ingressList.forEach((ingress) => collector.addIngress(ingress, cbCtx))
  getVirtualServices(cbCtx).forEach((virtualService) => collector.addVirtualService(virtualService))

  const urlPathMaps: Array<ApplicationGatewayUrlPathMap> = []
  const requestRoutingRules: Array<ApplicationGatewayRequestRoutingRule> = []

  listeners.listenersByKey.forEach(({ listenerId, listener }) => {
    const pathMap = collector.get(listenerId)
    const ruleName = generateRequestRoutingRuleName(listenerId)
    const httpListener = { id: listener.id }

    if (pathMap.pathRules.size === 0) {
      requestRoutingRules.push({
        id: gatewayIdentifier.requestRoutingRuleId(ruleName),
        name: ruleName,
        properties: {
          ruleType: ApplicationGatewayRequestRoutingRuleType.Basic,
          httpListener,
          backendAddressPool: pathMap.defaultBackend.pool,
          backendHttpSettings: pathMap.defaultBackend.settings,
        },
      })

      return
    }

    const urlPathMapName = generateUrlPathMapName(listenerId)
    const pathRules: Array<ApplicationGatewayPathRule> = [...pathMap.pathRules.values()]
      .map(({ name, paths, backend }) => ({
        id: gatewayIdentifier.pathRuleId(urlPathMapName, name),
        name,
        properties: {
          paths,
          backendAddressPool: backend.pool,
          backendHttpSettings: backend.settings,
        },
      }))
      .sort(compareByName)

    urlPathMaps.push({
      id: gatewayIdentifier.urlPathMapId(urlPathMapName),
      name: urlPathMapName,
      properties: {
        defaultBackendAddressPool: pathMap.defaultBackend.pool,
        defaultBackendHttpSettings: pathMap.defaultBackend.settings,
        pathRules,
      },
    })

    requestRoutingRules.push({
      id: gatewayIdentifier.requestRoutingRuleId(ruleName),
      name: ruleName,
      properties: {
        ruleType: ApplicationGatewayRequestRoutingRuleType.PathBasedRouting,
        httpListener,
        urlPathMap: { id: gatewayIdentifier.urlPathMapId(urlPathMapName) },
      },
    })
  })

  const [preservedPathMaps, preservedRules]: [
    Array<ApplicationGatewayUrlPathMap>,
    Array<ApplicationGatewayRequestRoutingRule>,
  ] = stage.existing
    ? [stage.existing.getBlacklistedUrlPathMaps()[0], stage.existing.getBlacklistedRoutingRules()[0]]
    : [[], []]

  gateway.properties.urlPathMaps = mergeByName(preservedPathMaps, urlPathMaps)
  gateway.properties.requestRoutingRules = mergeByName(preservedRules, requestRoutingRules)
}
