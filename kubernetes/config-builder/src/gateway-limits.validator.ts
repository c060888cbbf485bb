import { EventReason }            from '@appgw-ingress/k8s-event-recorder'

import { ValidationContext }      from './config-builder.interfaces'
import { Validator }              from './config-builder.interfaces'
import { GatewayCollectionLimit } from './config-builder.constants'
import { ValidationError }        from './config-builder.errors'

export const gatewayLimitsValidator: Validator = {
  name: 'gateway-limits',

  validate({ properties }: ValidationContext) {
    const collections: Record<string, number> = {
      probes: properties.probes?.length ?? 0,
      backendHttpSettingsCollection: properties.backendHttpSettingsCollection?.length ?? 0,
      backendAddressPools: properties.backendAddressPools?.length ?? 0,
      frontendPorts: properties.frontendPorts?.length ?? 0,
      httpListeners: properties.httpListeners?.length ?? 0,
      requestRoutingRules: properties.requestRoutingRules?.length ?? 0,
      urlPathMaps: properties.urlPathMaps?.length ?? 0,
    }

    for (const [collection, count] of Object.entries(collections)) {
      if (count > GatewayCollectionLimit) {
        throw new ValidationError(
          `Gateway ${collection} count ${count} exceeds the limit of ${GatewayCollectionLimit}`,
          EventReason.InvalidConfiguration
        )
      }
    }

    for (const urlPathMap of properties.urlPathMaps ?? []) {
      if (urlPathMap.properties.pathRules.length > GatewayCollectionLimit) {
        throw new ValidationError(
          `URL path map ${urlPathMap.name} path rules count ${urlPathMap.properties.pathRules.length} exceeds the limit of ${GatewayCollectionLimit}`,
          EventReason.InvalidConfiguration
        )
      }
    }
  },
}
