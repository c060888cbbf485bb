import { EventReason }       from '@appgw-ingress/k8s-event-recorder'

import { ValidationContext } from './config-builder.interfaces'
import { Validator }         from './config-builder.interfaces'
import { ValidationError }   from './config-builder.errors'

const fail = (message: string): never => {
  throw new ValidationError(message, EventReason.InvalidConfiguration)
}

export const urlPathMapsValidator: Validator = {
  name: 'url-path-maps',

  validate({ properties }: ValidationContext) {
    for (const { name, properties: pathMap } of properties.urlPathMaps ?? []) {
      const hasDefaultBackend =
        Boolean(pathMap.defaultBackendAddressPool && pathMap.defaultBackendHttpSettings) ||
        Boolean(pathMap.defaultRedirectConfiguration)

      if (!hasDefaultBackend) {
        fail(`URL path map ${name} has no default backend address pool or backend http settings`)
      }

      if (pathMap.pathRules.length === 0) {
        fail(`URL path map ${name} has no path rules`)
      }

      const paths = new Set<string>()

      for (const pathRule of pathMap.pathRules) {
        const hasBackend =
          Boolean(pathRule.properties.backendAddressPool && pathRule.properties.backendHttpSettings) ||
          Boolean(pathRule.properties.redirectConfiguration)

        if (!hasBackend) {
          fail(`Path rule ${pathRule.name} of URL path map ${name} has no backend address pool or backend http settings`)
        }

        for (const path of pathRule.properties.paths) {
          if (paths.has(path)) {
            fail(`Path ${path} is used by more than one path rule of URL path map ${name}`)
          }

          paths.add(path)
        }
      }
    }
  },
}
