import { ApplicationGateway }                    from '@appgw-ingress/gateway-api'
import { ApplicationGatewayBackendAddressPool }  from '@appgw-ingress/gateway-api'
import { ApplicationGatewayBackendHttpSettings } from '@appgw-ingress/gateway-api'
import { ApplicationGatewayFrontendPort }        from '@appgw-ingress/gateway-api'
import { ApplicationGatewayHttpListener }        from '@appgw-ingress/gateway-api'
import { ApplicationGatewayProbe }               from '@appgw-ingress/gateway-api'
import { ApplicationGatewayRequestRoutingRule }  from '@appgw-ingress/gateway-api'
import { ApplicationGatewayUrlPathMap }          from '@appgw-ingress/gateway-api'
import { ProhibitedTargetResource }              from '@appgw-ingress/k8s-prohibited-target-api'
import { getLastChunkOfSlashed }                 from '@appgw-ingress/gateway-api'

import { Target }                                from './target'
import { TargetBlacklist }                       from './target'
import { getTargetBlacklist }                    from './target'

export interface NamedResource {
  name: string
}

export type Partition<T> = [blacklisted: Array<T>, nonBlacklisted: Array<T>]

export const compareByName = <T extends NamedResource>(a: T, b: T): number => {
  if (a.name === b.name) {
    return 0
  }

  return a.name < b.name ? -1 : 1
}

const partition = <T extends NamedResource>(items: Array<T>, names: Set<string>): Partition<T> =>
  items.reduce<Partition<T>>(
    ([blacklisted, nonBlacklisted], item) =>
      names.has(item.name)
        ? [[...blacklisted, item], nonBlacklisted]
        : [blacklisted, [...nonBlacklisted, item]],
    [[], []]
  )

const lastChunk = (id?: string): string | undefined => (id ? getLastChunkOfSlashed(id) : undefined)

/**
 * Snapshot of the gateway configuration found before the build, split into
 * the objects owned by other parties and the objects the controller manages.
 */
export class ExistingResources {
  readonly blacklist: TargetBlacklist

  private listenersByName?: Map<string, ApplicationGatewayHttpListener>

  private blacklistedListeners?: Set<string>

  constructor(
    private readonly gateway: ApplicationGateway,
    readonly prohibitedTargets: Array<ProhibitedTargetResource>,
    listenersByName?: Map<string, ApplicationGatewayHttpListener>
  ) {
    this.blacklist = getTargetBlacklist(prohibitedTargets)
    this.listenersByName = listenersByName
  }

  get listeners(): Array<ApplicationGatewayHttpListener> {
    return this.gateway.properties.httpListeners ?? []
  }

  get routingRules(): Array<ApplicationGatewayRequestRoutingRule> {
    return this.gateway.properties.requestRoutingRules ?? []
  }

  get urlPathMaps(): Array<ApplicationGatewayUrlPathMap> {
    return this.gateway.properties.urlPathMaps ?? []
  }

  get backendAddressPools(): Array<ApplicationGatewayBackendAddressPool> {
    return this.gateway.properties.backendAddressPools ?? []
  }

  get backendHttpSettings(): Array<ApplicationGatewayBackendHttpSettings> {
    return this.gateway.properties.backendHttpSettingsCollection ?? []
  }

  get probes(): Array<ApplicationGatewayProbe> {
    return this.gateway.properties.probes ?? []
  }

  get frontendPorts(): Array<ApplicationGatewayFrontendPort> {
    return this.gateway.properties.frontendPorts ?? []
  }

  getListenersByName(): Map<string, ApplicationGatewayHttpListener> {
    if (!this.listenersByName) {
      this.listenersByName = new Map(this.listeners.map((listener) => [listener.name, listener]))
    }

    return this.listenersByName
  }

  getListenerTargets(listener: ApplicationGatewayHttpListener): Array<Target> {
    const hostname = listener.properties.hostName ?? ''
    const rules = this.routingRules.filter(
      (rule) => lastChunk(rule.properties.httpListener.id) === listener.name
    )

    if (rules.length === 0) {
      return [new Target(hostname)]
    }

    return rules.flatMap((rule) => {
      const urlPathMapName = lastChunk(rule.properties.urlPathMap?.id)
      const urlPathMap = this.urlPathMaps.find((pathMap) => pathMap.name === urlPathMapName)
      const paths = (urlPathMap?.properties.pathRules ?? []).flatMap(
        (pathRule) => pathRule.properties.paths
      )

      if (paths.length === 0) {
        return [new Target(hostname)]
      }

      return paths.map((path) => new Target(hostname, path))
    })
  }

  getBlacklistedListenersSet(): Set<string> {
    if (!this.blacklistedListeners) {
      const blacklisted = new Set<string>()

      this.getListenersByName().forEach((listener, name) => {
        if (this.getListenerTargets(listener).some((target) => target.isBlacklisted(this.blacklist))) {
          blacklisted.add(name)
        }
      })

      this.blacklistedListeners = blacklisted
    }

    return this.blacklistedListeners
  }

  getBlacklistedListeners(): Partition<ApplicationGatewayHttpListener> {
    return partition(this.listeners, this.getBlacklistedListenersSet())
  }

  getBlacklistedRoutingRules(): Partition<ApplicationGatewayRequestRoutingRule> {
    const listeners = this.getBlacklistedListenersSet()
    const names = new Set(
      this.routingRules
        .filter((rule) => listeners.has(lastChunk(rule.properties.httpListener.id) ?? ''))
        .map((rule) => rule.name)
    )

    return partition(this.routingRules, names)
  }

  getBlacklistedUrlPathMaps(): Partition<ApplicationGatewayUrlPathMap> {
    return partition(this.urlPathMaps, this.collectReferences((rule) => [rule.properties.urlPathMap?.id]))
  }

  getBlacklistedBackendPools(): Partition<ApplicationGatewayBackendAddressPool> {
    return partition(
      this.backendAddressPools,
      this.collectReferences(
        (rule) => [rule.properties.backendAddressPool?.id],
        (pathMap) => [
          pathMap.properties.defaultBackendAddressPool?.id,
          ...pathMap.properties.pathRules.map((pathRule) => pathRule.properties.backendAddressPool?.id),
        ]
      )
    )
  }

  getBlacklistedHttpSettings(): Partition<ApplicationGatewayBackendHttpSettings> {
    return partition(this.backendHttpSettings, this.getBlacklistedHttpSettingsSet())
  }

  getBlacklistedProbes(): Partition<ApplicationGatewayProbe> {
    const settings = this.getBlacklistedHttpSettingsSet()
    const names = new Set<string>()

    for (const setting of this.backendHttpSettings) {
      const probeName = lastChunk(setting.properties.probe?.id)

      if (settings.has(setting.name) && probeName) {
        names.add(probeName)
      }
    }

    return partition(this.probes, names)
  }

  getBlacklistedFrontendPorts(): Partition<ApplicationGatewayFrontendPort> {
    const listeners = this.getBlacklistedListenersSet()
    const names = new Set<string>()

    for (const listener of this.listeners) {
      const portName = lastChunk(listener.properties.frontendPort.id)

      if (listeners.has(listener.name) && portName) {
        names.add(portName)
      }
    }

    return partition(this.frontendPorts, names)
  }

  private getBlacklistedHttpSettingsSet(): Set<string> {
    return this.collectReferences(
      (rule) => [rule.properties.backendHttpSettings?.id],
      (pathMap) => [
        pathMap.properties.defaultBackendHttpSettings?.id,
        ...pathMap.properties.pathRules.map((pathRule) => pathRule.properties.backendHttpSettings?.id),
      ]
    )
  }

  private collectReferences(
    fromRule: (rule: ApplicationGatewayRequestRoutingRule) => Array<string | undefined>,
    fromPathMap: (pathMap: ApplicationGatewayUrlPathMap) => Array<string | undefined> = () => []
  ): Set<string> {
    const [rules] = this.getBlacklistedRoutingRules()
    const pathMapNames = new Set(rules.map((rule) => lastChunk(rule.properties.urlPathMap?.id)))
    const pathMaps = this.urlPathMaps.filter((pathMap) => pathMapNames.has(pathMap.name))

    const ids = [...rules.flatMap(fromRule), ...pathMaps.flatMap(fromPathMap)]

    return new Set(ids.map(lastChunk).filter((name): name is string => Boolean(name)))
  }
}

export const mergeByName = <T extends NamedResource>(
  preserved: Array<T>,
  generated: Array<T>
): Array<T> => {
  const names = new Set(preserved.map((item) => item.name))

  return [...preserved, ...generated.filter((item) => !names.has(item.name))].sort(compareByName)
}

const getListenerKey = (listener: ApplicationGatewayHttpListener): string =>
  `${listener.properties.frontendPort.id}|${(listener.properties.hostName ?? '').toLowerCase()}`

/**
 * Preserved listeners keep their frontend port and hostname, generated listeners
 * claiming the same pair are dropped.
 */
export const mergeListeners = (
  preserved: Array<ApplicationGatewayHttpListener>,
  generated: Array<ApplicationGatewayHttpListener>
): Array<ApplicationGatewayHttpListener> => {
  const keys = new Set(preserved.map(getListenerKey))

  return mergeByName(
    preserved,
    generated.filter((listener) => !keys.has(getListenerKey(listener)))
  )
}
