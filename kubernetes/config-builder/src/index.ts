export * from './annotations'
export * from './backend-address-pools'
export * from './backend-http-settings'
export * from './config-builder'
export * from './config-builder.constants'
export * from './config-builder.enums'
export * from './config-builder.errors'
export * from './config-builder.interfaces'
export * from './defaults'
export * from './environment'
export * from './frontend-listeners'
export * from './gateway-limits.validator'
export * from './health-probes'
export * from './identifiers'
export * from './ingress-hosts.validator'
export * from './ingress.utils'
export * from './naming'
export * from './port-resolver'
export * from './request-routing-rules'
export * from './service-definition.validator'
export * from './tags'
export * from './url-path-maps.validator'
export * from './validators'
export * from './version'
