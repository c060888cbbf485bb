import { ApplicationGatewayBackendAddressPool }  from '@appgw-ingress/gateway-api'
import { ApplicationGatewayBackendHttpSettings } from '@appgw-ingress/gateway-api'
import { ApplicationGatewayCookieBasedAffinity } from '@appgw-ingress/gateway-api'
import { ApplicationGatewayIdentifier }          from '@appgw-ingress/gateway-api'
import { ApplicationGatewayProbe }               from '@appgw-ingress/gateway-api'
import { ApplicationGatewayProtocol }            from '@appgw-ingress/gateway-api'

import { DefaultBackendAddressPoolName }         from './config-builder.constants'
import { DefaultBackendHttpSettingsName }        from './config-builder.constants'
import { DefaultProbeInterval }                  from './config-builder.constants'
import { DefaultProbeName }                      from './config-builder.constants'
import { DefaultProbeTimeout }                   from './config-builder.constants'
import { DefaultProbeUnhealthyThreshold }        from './config-builder.constants'
import { DefaultRequestTimeout }                 from './config-builder.constants'
import { HttpPort }                              from './config-builder.constants'

export const defaultProbe = (
  identifier: ApplicationGatewayIdentifier,
  name: string = DefaultProbeName
): ApplicationGatewayProbe => ({
  id: identifier.probeId(name),
  name,
  properties: {
    protocol: ApplicationGatewayProtocol.Http,
    host: 'localhost',
    path: '/',
    interval: DefaultProbeInterval,
    timeout: DefaultProbeTimeout,
    unhealthyThreshold: DefaultProbeUnhealthyThreshold,
  },
})

export const defaultBackendHttpSettings = (
  identifier: ApplicationGatewayIdentifier,
  name: string = DefaultBackendHttpSettingsName,
  port: number = HttpPort
): ApplicationGatewayBackendHttpSettings => ({
  id: identifier.httpSettingsId(name),
  name,
  properties: {
    port,
    protocol: ApplicationGatewayProtocol.Http,
    cookieBasedAffinity: ApplicationGatewayCookieBasedAffinity.Disabled,
    requestTimeout: DefaultRequestTimeout,
    pickHostNameFromBackendAddress: false,
  },
})

export const defaultBackendAddressPool = (
  identifier: ApplicationGatewayIdentifier
): ApplicationGatewayBackendAddressPool => ({
  id: identifier.addressPoolId(DefaultBackendAddressPoolName),
  name: DefaultBackendAddressPoolName,
  properties: {
    backendAddresses: [],
  },
})
