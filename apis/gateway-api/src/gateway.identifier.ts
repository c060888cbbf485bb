import { ApplicationGatewayCollection } from './gateway.types'

export class ApplicationGatewayIdentifier {
  constructor(
    public readonly subscriptionId: string,
    public readonly resourceGroupName: string,
    public readonly gatewayName: string
  ) {}

  gatewayId(): string {
    return [
      '/subscriptions',
      this.subscriptionId,
      'resourceGroups',
      this.resourceGroupName,
      'providers/Microsoft.Network/applicationGateways',
      this.gatewayName,
    ].join('/')
  }

  childId(collection: ApplicationGatewayCollection, name: string): string {
    return `${this.gatewayId()}/${collection}/${name}`
  }

  probeId(name: string): string {
    return this.childId(ApplicationGatewayCollection.Probes, name)
  }

  httpSettingsId(name: string): string {
    return this.childId(ApplicationGatewayCollection.BackendHttpSettings, name)
  }

  addressPoolId(name: string): string {
    return this.childId(ApplicationGatewayCollection.BackendAddressPools, name)
  }

  frontendIpConfigurationId(name: string): string {
    return this.childId(ApplicationGatewayCollection.FrontendIPConfigurations, name)
  }

  frontendPortId(name: string): string {
    return this.childId(ApplicationGatewayCollection.FrontendPorts, name)
  }

  listenerId(name: string): string {
    return this.childId(ApplicationGatewayCollection.HttpListeners, name)
  }

  sslCertificateId(name: string): string {
    return this.childId(ApplicationGatewayCollection.SslCertificates, name)
  }

  urlPathMapId(name: string): string {
    return this.childId(ApplicationGatewayCollection.UrlPathMaps, name)
  }

  pathRuleId(urlPathMapName: string, name: string): string {
    return `${this.urlPathMapId(urlPathMapName)}/pathRules/${name}`
  }

  requestRoutingRuleId(name: string): string {
    return this.childId(ApplicationGatewayCollection.RequestRoutingRules, name)
  }
}

export const getLastChunkOfSlashed = (id: string): string => id.split('/').pop() ?? id
