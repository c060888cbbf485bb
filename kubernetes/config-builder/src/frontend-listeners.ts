import { ApplicationGateway }                        from '@appgw-ingress/gateway-api'
import { ApplicationGatewayFrontendIPConfiguration } from '@appgw-ingress/gateway-api'
import { ApplicationGatewayFrontendPort }            from '@appgw-ingress/gateway-api'
import { ApplicationGatewayHttpListener }            from '@appgw-ingress/gateway-api'
import { ApplicationGatewayProtocol }                from '@appgw-ingress/gateway-api'
import { mergeByName }                               from '@appgw-ingress/k8s-brownfield'
import { mergeListeners }                            from '@appgw-ingress/k8s-brownfield'

import { ConfigBuilderContext }                      from './config-builder.interfaces'
import { StageContext }                              from './config-builder.interfaces'
import { HttpPort }                                  from './config-builder.constants'
import { ListenerIdentifier }                        from './identifiers'
import { ListenerConfig }                            from './ingress.utils'
import { generateFrontendPortName }                  from './naming'
import { generateListenerName }                      from './naming'
import { getIngressListenerRules }                   from './ingress.utils'
import { getVirtualServiceListenerConfigs }          from './ingress.utils'
import { getVirtualServices }                        from './ingress.utils'
import { isCatchAllListenerProhibited }              from './ingress.utils'

export interface GeneratedListener {
  listenerId: ListenerIdentifier
  listener: ApplicationGatewayHttpListener
}

export interface FrontendListenersResult {
  listenersByKey: Map<string, GeneratedListener>
}

export const getListenerConfigs = (cbCtx: ConfigBuilderContext): Map<string, ListenerConfig> => {
  const configs = new Map<string, ListenerConfig>()

  const add = (config: ListenerConfig) => {
    if (!configs.has(config.listenerId.key)) {
      configs.set(config.listenerId.key, config)
    }
  }

  for (const ingress of cbCtx.ingressList) {
    getIngressListenerRules(ingress, cbCtx).forEach(({ config }) => add(config))
  }

  for (const virtualService of getVirtualServices(cbCtx)) {
    getVirtualServiceListenerConfigs(virtualService).forEach(add)
  }

  if (configs.size === 0 && !isCatchAllListenerProhibited(cbCtx)) {
    add({ listenerId: new ListenerIdentifier(HttpPort), protocol: ApplicationGatewayProtocol.Http })
  }

  return configs
}

export const getFrontendIpConfiguration = (
  gateway: ApplicationGateway,
  usePrivateIp: boolean
): ApplicationGatewayFrontendIPConfiguration => {
  const configuration = (gateway.properties.frontendIPConfigurations ?? []).find((ipConfiguration) =>
    usePrivateIp
      ? Boolean(ipConfiguration.properties.privateIPAddress)
      : Boolean(ipConfiguration.properties.publicIPAddress))

  if (!configuration) {
    throw new Error(`Unable to find ${usePrivateIp ? 'private' : 'public'} frontend IP configuration`)
  }

  return configuration
}

const getFrontendPorts = (
  stage: StageContext,
  gateway: ApplicationGateway,
  configs: Map<string, ListenerConfig>
): Map<number, ApplicationGatewayFrontendPort> => {
  const existing = gateway.properties.frontendPorts ?? []
  const ports = new Map<number, ApplicationGatewayFrontendPort>()

  configs.forEach(({ listenerId: { frontendPort } }) => {
    if (!ports.has(frontendPort)) {
      const name = generateFrontendPortName(frontendPort)

      ports.set(
        frontendPort,
        existing.find((port) => port.properties.port === frontendPort) ?? {
          id: stage.gatewayIdentifier.frontendPortId(name),
          name,
          properties: { port: frontendPort },
        }
      )
    }
  })

  return ports
}

export const generateFrontendListeners = (
  stage: StageContext,
  gateway: ApplicationGateway,
  cbCtx: ConfigBuilderContext
): FrontendListenersResult => {
  const configs = getListenerConfigs(cbCtx)
  const ipConfiguration = getFrontendIpConfiguration(gateway, cbCtx.envVariables.usePrivateIp)
  const ports = getFrontendPorts(stage, gateway, configs)
  const generated = new Map<string, GeneratedListener>()

  configs.forEach(({ listenerId, protocol, sslCertificateName }, key) => {
    const name = generateListenerName(listenerId)
    const port = ports.get(listenerId.frontendPort)

    if (!port) {
      throw new Error(`Frontend port ${listenerId.frontendPort} was not generated for listener ${name}`)
    }

    generated.set(key, {
      listenerId,
      listener: {
        id: stage.gatewayIdentifier.listenerId(name),
        name,
        properties: {
          frontendIPConfiguration: { id: ipConfiguration.id },
          frontendPort: { id: port.id },
          protocol,
          ...(listenerId.hostName ? { hostName: listenerId.hostName } : {}),
          ...(sslCertificateName
            ? { sslCertificate: { id: stage.gatewayIdentifier.sslCertificateId(sslCertificateName) } }
            : {}),
        },
      },
    })
  })

  const [preservedListeners, preservedPorts]: [
    Array<ApplicationGatewayHttpListener>,
    Array<ApplicationGatewayFrontendPort>,
  ] = stage.existing
    ? [stage.existing.getBlacklistedListeners()[0], stage.existing.getBlacklistedFrontendPorts()[0]]
    : [[], []]

  const listeners = mergeListeners(
    preservedListeners,
    [...generated.values()].map(({ listener }) => listener)
  )
  const kept = new Set(listeners)

  gateway.properties.frontendPorts = mergeByName(preservedPorts, [...ports.values()])
  gateway.properties.httpListeners = listeners

  return {
    listenersByKey: new Map([...generated].filter(([, { listener }]) => kept.has(listener))),
  }
}
