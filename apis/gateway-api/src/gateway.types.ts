/* eslint-disable no-shadow */

export enum ApplicationGatewayProtocol {
  Http = 'Http',
  Https = 'Https',
}

export enum ApplicationGatewayCookieBasedAffinity {
  Enabled = 'Enabled',
  Disabled = 'Disabled',
}

export enum ApplicationGatewayRequestRoutingRuleType {
  Basic = 'Basic',
  PathBasedRouting = 'PathBasedRouting',
}

export enum ApplicationGatewayCollection {
  Probes = 'probes',
  BackendHttpSettings = 'backendHttpSettingsCollection',
  BackendAddressPools = 'backendAddressPools',
  FrontendIPConfigurations = 'frontendIPConfigurations',
  FrontendPorts = 'frontendPorts',
  HttpListeners = 'httpListeners',
  SslCertificates = 'sslCertificates',
  UrlPathMaps = 'urlPathMaps',
  RequestRoutingRules = 'requestRoutingRules',
}
