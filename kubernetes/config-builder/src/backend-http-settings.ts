import { ApplicationGateway }                    from '@appgw-ingress/gateway-api'
import { ApplicationGatewayBackendHttpSettings } from '@appgw-ingress/gateway-api'
import { ApplicationGatewayCookieBasedAffinity } from '@appgw-ingress/gateway-api'
import { ApplicationGatewayProtocol }            from '@appgw-ingress/gateway-api'
import { EventReason }                           from '@appgw-ingress/k8s-event-recorder'
import { EventType }                             from '@appgw-ingress/k8s-event-recorder'
import { Logger }                                from '@appgw-ingress/logger'
import { mergeByName }                           from '@appgw-ingress/k8s-brownfield'

import { ConfigBuilderContext }                  from './config-builder.interfaces'
import { StageContext }                          from './config-builder.interfaces'
import { DefaultRequestTimeout }                 from './config-builder.constants'
import { HealthProbesResult }                    from './health-probes'
import { BackendIdentifier }                     from './identifiers'
import { ResolvableBackendIdentifier }           from './identifiers'
import { ServiceBackendPort }                    from './port-resolver'
import { ServiceBackendPortPair }                from './port-resolver'
import { collectBackendIds }                     from './ingress.utils'
import { collectIstioDestinationIds }            from './ingress.utils'
import { defaultBackendHttpSettings }            from './defaults'
import { defaultProbe }                          from './defaults'
import { generateHttpSettingsName }              from './naming'
import { getBackendPathPrefix }                  from './annotations'
import { getBackendProtocol }                    from './annotations'
import { getRequestTimeout }                     from './annotations'
import { getService }                            from './port-resolver'
import { isCookieBasedAffinity }                 from './annotations'
import { resolveServiceBackendPorts }            from './port-resolver'

export interface ResolvedBackend {
  backendId: ResolvableBackendIdentifier
  pair: ServiceBackendPortPair
  settings: ApplicationGatewayBackendHttpSettings
}

export interface BackendHttpSettingsResult {
  resolvedBackends: Map<string, ResolvedBackend>
}

const logger = new Logger('BackendHttpSettings')

const getServiceBackendPort = (backendId: ResolvableBackendIdentifier): ServiceBackendPort =>
  backendId instanceof BackendIdentifier
    ? backendId.backend.port ?? {}
    : { number: backendId.destination.port?.number }

const resolveBackendPortPair = (
  stage: StageContext,
  backendId: ResolvableBackendIdentifier
): ServiceBackendPortPair | undefined => {
  const service = getService(stage.k8sContext, backendId)
  const port = getServiceBackendPort(backendId)

  if (!service) {
    stage.recorder.event(
      backendId.owner,
      EventType.Warning,
      EventReason.ServiceNotFound,
      `Unable to get the service [${backendId.serviceKey}]`
    )
  }

  const pairs = resolveServiceBackendPorts(stage.k8sContext, backendId, service, port)

  if (pairs.length === 0) {
    const message = `Unable to resolve any backend port for service [${backendId.serviceKey}] and service port [${backendId.servicePort}]`

    logger.warn(message)
    stage.recorder.event(backendId.owner, EventType.Warning, EventReason.PortResolutionError, message)

    return undefined
  }

  if (pairs.length > 1) {
    const message = `More than one service-backend port binding is not allowed for service [${backendId.serviceKey}] and service port [${backendId.servicePort}]`

    stage.recorder.event(backendId.owner, EventType.Warning, EventReason.PortResolutionError, message)

    throw new Error(message)
  }

  return pairs[0]
}

const generateBackendSettings = (
  stage: StageContext,
  backendId: ResolvableBackendIdentifier,
  pair: ServiceBackendPortPair,
  probes: HealthProbesResult
): ApplicationGatewayBackendHttpSettings => {
  const settings = defaultBackendHttpSettings(
    stage.gatewayIdentifier,
    generateHttpSettingsName(backendId, pair.backendPort),
    pair.backendPort
  )

  if (backendId instanceof BackendIdentifier) {
    const { ingress } = backendId
    const probe = probes.probesByBackend.get(backendId.key)
    const pathPrefix = getBackendPathPrefix(ingress)

    settings.properties.protocol = getBackendProtocol(ingress) ?? ApplicationGatewayProtocol.Http
    settings.properties.cookieBasedAffinity = isCookieBasedAffinity(ingress)
      ? ApplicationGatewayCookieBasedAffinity.Enabled
      : ApplicationGatewayCookieBasedAffinity.Disabled
    settings.properties.requestTimeout = getRequestTimeout(ingress) ?? DefaultRequestTimeout

    if (probe) {
      settings.properties.probe = { id: probe.id }
    }

    if (pathPrefix) {
      settings.properties.path = pathPrefix
    }
  }

  return settings
}

export const generateBackendHttpSettings = (
  stage: StageContext,
  gateway: ApplicationGateway,
  cbCtx: ConfigBuilderContext,
  probes: HealthProbesResult
): BackendHttpSettingsResult => {
  const defaultSettings = defaultBackendHttpSettings(stage.gatewayIdentifier)
  const resolvedBackends = new Map<string, ResolvedBackend>()

  defaultSettings.properties.probe = { id: defaultProbe(stage.gatewayIdentifier).id }

  const settingsByName = new Map<string, ApplicationGatewayBackendHttpSettings>([
    [defaultSettings.name, defaultSettings],
  ])

  const backendIds: Array<ResolvableBackendIdentifier> = [
    ...collectBackendIds(cbCtx),
    ...collectIstioDestinationIds(cbCtx),
  ]

  for (const backendId of backendIds) {
    const pair = resolveBackendPortPair(stage, backendId)

    if (pair) {
      const settings = settingsByName.get(generateHttpSettingsName(backendId, pair.backendPort)) ??
        generateBackendSettings(stage, backendId, pair, probes)

      settingsByName.set(settings.name, settings)
      resolvedBackends.set(backendId.key, { backendId, pair, settings })
    }
  }

  const preserved: Array<ApplicationGatewayBackendHttpSettings> =
    stage.existing?.getBlacklistedHttpSettings()[0] ?? []

  gateway.properties.backendHttpSettingsCollection = mergeByName(preserved, [...settingsByName.values()])

  return { resolvedBackends }
}
