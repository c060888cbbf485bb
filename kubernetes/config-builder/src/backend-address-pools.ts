import { ApplicationGateway }                   from '@appgw-ingress/gateway-api'
import { ApplicationGatewayBackendAddressPool } from '@appgw-ingress/gateway-api'
import { EventReason }                          from '@appgw-ingress/k8s-event-recorder'
import { EventType }                            from '@appgw-ingress/k8s-event-recorder'
import { mergeByName }                          from '@appgw-ingress/k8s-brownfield'

import { StageContext }                         from './config-builder.interfaces'
import { BackendHttpSettingsResult }            from './backend-http-settings'
import { ResolvedBackend }                      from './backend-http-settings'
import { defaultBackendAddressPool }            from './defaults'
import { generateAddressPoolName }              from './naming'
import { getEndpoints }                         from './port-resolver'

export interface BackendAddressPoolsResult {
  poolsByBackend: Map<string, ApplicationGatewayBackendAddressPool>
}

const getBackendAddressPool = (
  stage: StageContext,
  { backendId, pair }: ResolvedBackend
): ApplicationGatewayBackendAddressPool | undefined => {
  const endpoints = getEndpoints(stage.k8sContext, backendId)

  if (!endpoints) {
    return undefined
  }

  const subsets = (endpoints.subsets ?? []).filter((subset) =>
    (subset.ports ?? []).some(
      (port) => (!port.protocol || port.protocol === 'TCP') && port.port === pair.backendPort
    ))

  if (subsets.length === 0) {
    stage.recorder.event(
      backendId.owner,
      EventType.Warning,
      EventReason.BackendPortTargetMatch,
      `Backend target port ${pair.backendPort} does not have matching endpoint port for service [${backendId.serviceKey}]`
    )

    return undefined
  }

  const ipAddresses = new Set(
    subsets.flatMap((subset) => (subset.addresses ?? []).map((address) => address.ip))
  )
  const name = generateAddressPoolName(backendId, pair.servicePort, pair.backendPort)

  return {
    id: stage.gatewayIdentifier.addressPoolId(name),
    name,
    properties: {
      backendAddresses: [...ipAddresses].map((ipAddress) => ({ ipAddress })),
    },
  }
}

export const generateBackendAddressPools = (
  stage: StageContext,
  gateway: ApplicationGateway,
  settings: BackendHttpSettingsResult
): BackendAddressPoolsResult => {
  const defaultPool = defaultBackendAddressPool(stage.gatewayIdentifier)
  const pools = new Map<string, ApplicationGatewayBackendAddressPool>([[defaultPool.name, defaultPool]])
  const poolsByBackend = new Map<string, ApplicationGatewayBackendAddressPool>()

  settings.resolvedBackends.forEach((resolvedBackend, key) => {
    const pool = getBackendAddressPool(stage, resolvedBackend)

    if (pool) {
      const shared = pools.get(pool.name) ?? pool

      pools.set(shared.name, shared)
      poolsByBackend.set(key, shared)
    }
  })

  const preserved: Array<ApplicationGatewayBackendAddressPool> =
    stage.existing?.getBlacklistedBackendPools()[0] ?? []

  gateway.properties.backendAddressPools = mergeByName(preserved, [...pools.values()])

  return { poolsByBackend }
}
