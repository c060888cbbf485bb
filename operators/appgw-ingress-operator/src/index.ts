export * from './arm-gateway.client'
export * from './gateway-client.interfaces'
export * from './gateway-ingress.operator'
export * from './resource.guards'
