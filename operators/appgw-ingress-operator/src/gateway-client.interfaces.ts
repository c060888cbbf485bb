import { ApplicationGateway } from '@appgw-ingress/gateway-api'

export interface GatewayClient {
  get(): Promise<ApplicationGateway>
  update(gateway: ApplicationGateway): Promise<ApplicationGateway>
}
