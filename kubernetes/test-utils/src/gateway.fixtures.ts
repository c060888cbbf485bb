import { ApplicationGateway }                        from '@appgw-ingress/gateway-api'
import { ApplicationGatewayBackendAddressPool }      from '@appgw-ingress/gateway-api'
import { ApplicationGatewayBackendHttpSettings }     from '@appgw-ingress/gateway-api'
import { ApplicationGatewayFrontendIPConfiguration } from '@appgw-ingress/gateway-api'
import { ApplicationGatewayCookieBasedAffinity }     from '@appgw-ingress/gateway-api'
import { ApplicationGatewayHttpListener }            from '@appgw-ingress/gateway-api'
import { ApplicationGatewayIdentifier }              from '@appgw-ingress/gateway-api'
import { ApplicationGatewayProbe }                   from '@appgw-ingress/gateway-api'
import { ApplicationGatewayProtocol }                from '@appgw-ingress/gateway-api'
import { ApplicationGatewayRequestRoutingRuleType }  from '@appgw-ingress/gateway-api'
import { ProhibitedTargetResource }                  from '@appgw-ingress/k8s-prohibited-target-api'

import { GatewayName }                               from './fixtures.constants'
import { Host }                                      from './fixtures.constants'
import { Namespace }                                 from './fixtures.constants'
import { PrivateIpAddress }                          from './fixtures.constants'
import { PrivateIpName }                             from './fixtures.constants'
import { PublicIpName }                              from './fixtures.constants'
import { ResourceGroup }                             from './fixtures.constants'
import { SubscriptionId }                            from './fixtures.constants'

export const DefaultListenerName = 'fl-80'

export const PathBasedListenerName1 = 'HTTPListener-PathBased1'

export const PathBasedListenerName2 = 'HTTPListener-PathBased2'

export const BasicListenerName = 'HTTPListener-Basic'

export const newGatewayIdentifierFixture = (): ApplicationGatewayIdentifier =>
  new ApplicationGatewayIdentifier(SubscriptionId, ResourceGroup, GatewayName)

const identifier = newGatewayIdentifierFixture()

const listener = (name: string, port: string, hostName?: string): ApplicationGatewayHttpListener => ({
  id: identifier.listenerId(name),
  name,
  properties: {
    frontendIPConfiguration: { id: identifier.frontendIpConfigurationId(PublicIpName) },
    frontendPort: { id: identifier.frontendPortId(port) },
    protocol: ApplicationGatewayProtocol.Http,
    ...(hostName ? { hostName } : {}),
  },
})

const settings = (name: string, probe?: string): ApplicationGatewayBackendHttpSettings => ({
  id: identifier.httpSettingsId(name),
  name,
  properties: {
    port: 80,
    protocol: ApplicationGatewayProtocol.Http,
    cookieBasedAffinity: ApplicationGatewayCookieBasedAffinity.Disabled,
    requestTimeout: 30,
    pickHostNameFromBackendAddress: false,
    ...(probe ? { probe: { id: identifier.probeId(probe) } } : {}),
  },
})

const probe = (name: string, host: string): ApplicationGatewayProbe => ({
  id: identifier.probeId(name),
  name,
  properties: {
    protocol: ApplicationGatewayProtocol.Http,
    host,
    path: '/',
    interval: 30,
    timeout: 30,
    unhealthyThreshold: 3,
  },
})

const pool = (name: string): ApplicationGatewayBackendAddressPool => ({
  id: identifier.addressPoolId(name),
  name,
  properties: { backendAddresses: [] },
})

export const newFrontendIpConfigurationsFixture = (): Array<ApplicationGatewayFrontendIPConfiguration> => [
  {
    id: identifier.frontendIpConfigurationId(PublicIpName),
    name: PublicIpName,
    properties: {
      publicIPAddress: {
        id: '/subscriptions/test-subscription/resourceGroups/test-resource-group/providers/Microsoft.Network/publicIPAddresses/pip',
      },
    },
  },
  {
    id: identifier.frontendIpConfigurationId(PrivateIpName),
    name: PrivateIpName,
    properties: {
      privateIPAddress: PrivateIpAddress,
    },
  },
]

/**
 * Gateway with frontend IP configurations only.
 */
export const newEmptyApplicationGatewayFixture = (): ApplicationGateway => ({
  id: identifier.gatewayId(),
  name: GatewayName,
  location: 'westeurope',
  properties: {
    frontendIPConfigurations: newFrontendIpConfigurationsFixture(),
  },
})

/**
 * Gateway with four listeners:
 *   fl-80                   port 80, no host, basic rule
 *   HTTPListener-PathBased1 port 8080, bye.com, path map with /fox and /baz
 *   HTTPListener-PathBased2 port 8081, bye.com, path map with /bar
 *   HTTPListener-Basic      port 80, bye.com, basic rule
 */
export const newApplicationGatewayFixture = (): ApplicationGateway => ({
  id: identifier.gatewayId(),
  name: GatewayName,
  location: 'westeurope',
  tags: {
    environment: 'test',
  },
  properties: {
    frontendIPConfigurations: newFrontendIpConfigurationsFixture(),
    frontendPorts: [
      { id: identifier.frontendPortId('fp-80'), name: 'fp-80', properties: { port: 80 } },
      { id: identifier.frontendPortId('fp-8080'), name: 'fp-8080', properties: { port: 8080 } },
      { id: identifier.frontendPortId('fp-8081'), name: 'fp-8081', properties: { port: 8081 } },
    ],
    httpListeners: [
      listener(DefaultListenerName, 'fp-80'),
      listener(PathBasedListenerName1, 'fp-8080', Host),
      listener(PathBasedListenerName2, 'fp-8081', Host),
      listener(BasicListenerName, 'fp-80', Host),
    ],
    probes: [probe('Probe-Default', 'localhost'), probe('Probe-1', Host), probe('Probe-2', Host)],
    backendHttpSettingsCollection: [
      settings('BackendHTTPSettings-Default', 'Probe-Default'),
      settings('BackendHTTPSettings-1', 'Probe-1'),
      settings('BackendHTTPSettings-2', 'Probe-2'),
      settings('BackendHTTPSettings-Basic'),
    ],
    backendAddressPools: [
      pool('BackendAddressPool-Default'),
      pool('BackendAddressPool-1'),
      pool('BackendAddressPool-2'),
      pool('BackendAddressPool-Basic'),
    ],
    sslCertificates: [],
    urlPathMaps: [
      {
        id: identifier.urlPathMapId('URLPathMap-1'),
        name: 'URLPathMap-1',
        properties: {
          defaultBackendAddressPool: { id: identifier.addressPoolId('BackendAddressPool-1') },
          defaultBackendHttpSettings: { id: identifier.httpSettingsId('BackendHTTPSettings-1') },
          pathRules: [
            {
              id: identifier.pathRuleId('URLPathMap-1', 'PathRule-1'),
              name: 'PathRule-1',
              properties: {
                paths: ['/fox', '/baz'],
                backendAddressPool: { id: identifier.addressPoolId('BackendAddressPool-1') },
                backendHttpSettings: { id: identifier.httpSettingsId('BackendHTTPSettings-1') },
              },
            },
          ],
        },
      },
      {
        id: identifier.urlPathMapId('URLPathMap-2'),
        name: 'URLPathMap-2',
        properties: {
          defaultBackendAddressPool: { id: identifier.addressPoolId('BackendAddressPool-2') },
          defaultBackendHttpSettings: { id: identifier.httpSettingsId('BackendHTTPSettings-2') },
          pathRules: [
            {
              id: identifier.pathRuleId('URLPathMap-2', 'PathRule-2'),
              name: 'PathRule-2',
              properties: {
                paths: ['/bar'],
                backendAddressPool: { id: identifier.addressPoolId('BackendAddressPool-2') },
                backendHttpSettings: { id: identifier.httpSettingsId('BackendHTTPSettings-2') },
              },
            },
          ],
        },
      },
    ],
    requestRoutingRules: [
      {
        id: identifier.requestRoutingRuleId('RequestRoutingRule-Default'),
        name: 'RequestRoutingRule-Default',
        properties: {
          ruleType: ApplicationGatewayRequestRoutingRuleType.Basic,
          httpListener: { id: identifier.listenerId(DefaultListenerName) },
          backendAddressPool: { id: identifier.addressPoolId('BackendAddressPool-Default') },
          backendHttpSettings: { id: identifier.httpSettingsId('BackendHTTPSettings-Default') },
        },
      },
      {
        id: identifier.requestRoutingRuleId('RequestRoutingRule-1'),
        name: 'RequestRoutingRule-1',
        properties: {
          ruleType: ApplicationGatewayRequestRoutingRuleType.PathBasedRouting,
          httpListener: { id: identifier.listenerId(PathBasedListenerName1) },
          urlPathMap: { id: identifier.urlPathMapId('URLPathMap-1') },
        },
      },
      {
        id: identifier.requestRoutingRuleId('RequestRoutingRule-2'),
        name: 'RequestRoutingRule-2',
        properties: {
          ruleType: ApplicationGatewayRequestRoutingRuleType.PathBasedRouting,
          httpListener: { id: identifier.listenerId(PathBasedListenerName2) },
          urlPathMap: { id: identifier.urlPathMapId('URLPathMap-2') },
        },
      },
      {
        id: identifier.requestRoutingRuleId('RequestRoutingRule-Basic'),
        name: 'RequestRoutingRule-Basic',
        properties: {
          ruleType: ApplicationGatewayRequestRoutingRuleType.Basic,
          httpListener: { id: identifier.listenerId(BasicListenerName) },
          backendAddressPool: { id: identifier.addressPoolId('BackendAddressPool-Basic') },
          backendHttpSettings: { id: identifier.httpSettingsId('BackendHTTPSettings-Basic') },
        },
      },
    ],
  },
})

export const newProhibitedTargetFixture = (
  name: string,
  hostname?: string,
  paths?: Array<string>
): ProhibitedTargetResource => ({
  apiVersion: 'appgw.ingress.k8s.io/v1',
  kind: 'AzureIngressProhibitedTarget',
  metadata: {
    name,
    namespace: Namespace,
  },
  spec: {
    ...(hostname ? { hostname } : {}),
    ...(paths ? { paths } : {}),
  },
})
