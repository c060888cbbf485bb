import { ApplicationGatewayCookieBasedAffinity }    from './gateway.types'
import { ApplicationGatewayProtocol }               from './gateway.types'
import { ApplicationGatewayRequestRoutingRuleType } from './gateway.types'

export interface SubResource {
  id: string
}

export interface ApplicationGatewayChild<Properties> {
  id: string
  name: string
  etag?: string
  properties: Properties
}

export interface ApplicationGatewayProbeHealthResponseMatch {
  body?: string
  statusCodes?: Array<string>
}

export interface ApplicationGatewayProbePropertiesFormat {
  protocol: ApplicationGatewayProtocol
  host: string
  path: string
  interval: number
  timeout: number
  unhealthyThreshold: number
  pickHostNameFromBackendHttpSettings?: boolean
  minServers?: number
  match?: ApplicationGatewayProbeHealthResponseMatch
}

export type ApplicationGatewayProbe = ApplicationGatewayChild<ApplicationGatewayProbePropertiesFormat>

export interface ApplicationGatewayBackendHttpSettingsPropertiesFormat {
  port: number
  protocol: ApplicationGatewayProtocol
  cookieBasedAffinity: ApplicationGatewayCookieBasedAffinity
  requestTimeout: number
  pickHostNameFromBackendAddress: boolean
  probe?: SubResource
  hostName?: string
  path?: string
}

export type ApplicationGatewayBackendHttpSettings =
  ApplicationGatewayChild<ApplicationGatewayBackendHttpSettingsPropertiesFormat>

export interface ApplicationGatewayBackendAddress {
  ipAddress?: string
  fqdn?: string
}

export interface ApplicationGatewayBackendAddressPoolPropertiesFormat {
  backendAddresses: Array<ApplicationGatewayBackendAddress>
}

export type ApplicationGatewayBackendAddressPool =
  ApplicationGatewayChild<ApplicationGatewayBackendAddressPoolPropertiesFormat>

export interface ApplicationGatewayFrontendIPConfigurationPropertiesFormat {
  privateIPAddress?: string
  privateIPAllocationMethod?: string
  publicIPAddress?: SubResource
  subnet?: SubResource
}

export type ApplicationGatewayFrontendIPConfiguration =
  ApplicationGatewayChild<ApplicationGatewayFrontendIPConfigurationPropertiesFormat>

export interface ApplicationGatewayFrontendPortPropertiesFormat {
  port: number
}

export type ApplicationGatewayFrontendPort =
  ApplicationGatewayChild<ApplicationGatewayFrontendPortPropertiesFormat>

export interface ApplicationGatewayHttpListenerPropertiesFormat {
  frontendIPConfiguration: SubResource
  frontendPort: SubResource
  protocol: ApplicationGatewayProtocol
  hostName?: string
  sslCertificate?: SubResource
  requireServerNameIndication?: boolean
}

export type ApplicationGatewayHttpListener =
  ApplicationGatewayChild<ApplicationGatewayHttpListenerPropertiesFormat>

export interface ApplicationGatewaySslCertificatePropertiesFormat {
  data?: string
  password?: string
  publicCertData?: string
  keyVaultSecretId?: string
}

export type ApplicationGatewaySslCertificate =
  ApplicationGatewayChild<ApplicationGatewaySslCertificatePropertiesFormat>

export interface ApplicationGatewayPathRulePropertiesFormat {
  paths: Array<string>
  backendAddressPool?: SubResource
  backendHttpSettings?: SubResource
  redirectConfiguration?: SubResource
}

export type ApplicationGatewayPathRule = ApplicationGatewayChild<ApplicationGatewayPathRulePropertiesFormat>

export interface ApplicationGatewayUrlPathMapPropertiesFormat {
  defaultBackendAddressPool?: SubResource
  defaultBackendHttpSettings?: SubResource
  defaultRedirectConfiguration?: SubResource
  pathRules: Array<ApplicationGatewayPathRule>
}

export type ApplicationGatewayUrlPathMap =
  ApplicationGatewayChild<ApplicationGatewayUrlPathMapPropertiesFormat>

export interface ApplicationGatewayRequestRoutingRulePropertiesFormat {
  ruleType: ApplicationGatewayRequestRoutingRuleType
  httpListener: SubResource
  backendAddressPool?: SubResource
  backendHttpSettings?: SubResource
  urlPathMap?: SubResource
  redirectConfiguration?: SubResource
}

export type ApplicationGatewayRequestRoutingRule =
  ApplicationGatewayChild<ApplicationGatewayRequestRoutingRulePropertiesFormat>

export interface ApplicationGatewayPropertiesFormat {
  probes?: Array<ApplicationGatewayProbe>
  backendHttpSettingsCollection?: Array<ApplicationGatewayBackendHttpSettings>
  backendAddressPools?: Array<ApplicationGatewayBackendAddressPool>
  frontendIPConfigurations?: Array<ApplicationGatewayFrontendIPConfiguration>
  frontendPorts?: Array<ApplicationGatewayFrontendPort>
  httpListeners?: Array<ApplicationGatewayHttpListener>
  sslCertificates?: Array<ApplicationGatewaySslCertificate>
  urlPathMaps?: Array<ApplicationGatewayUrlPathMap>
  requestRoutingRules?: Array<ApplicationGatewayRequestRoutingRule>
  provisioningState?: string
}

export interface ApplicationGateway {
  id?: string
  name?: string
  location?: string
  etag?: string
  tags?: Record<string, string>
  properties: ApplicationGatewayPropertiesFormat
}
