import { V1Ingress }               from '@kubernetes/client-node'
import { V1IngressServiceBackend } from '@kubernetes/client-node'

import { EventReason }             from '@appgw-ingress/k8s-event-recorder'
import { EventType }               from '@appgw-ingress/k8s-event-recorder'
import { getResourceKey }          from '@appgw-ingress/k8s-context'

import { ValidationContext }       from './config-builder.interfaces'
import { Validator }               from './config-builder.interfaces'
import { ValidationError }         from './config-builder.errors'
import { findServicePort }         from './port-resolver'
import { getNamespace }            from './identifiers'

const getServiceBackends = (ingress: V1Ingress): Array<V1IngressServiceBackend> => {
  const backends = (ingress.spec?.rules ?? []).flatMap((rule) =>
    (rule.http?.paths ?? []).flatMap((path) => (path.backend.service ? [path.backend.service] : [])))
  const defaultBackend = ingress.spec?.defaultBackend?.service

  return defaultBackend ? [defaultBackend, ...backends] : backends
}

export const serviceDefinitionValidator: Validator = {
  name: 'service-definition',

  validate({ recorder, ingressList, serviceList }: ValidationContext) {
    const services = new Map(serviceList.map((service) => [getResourceKey(service), service]))

    for (const ingress of ingressList) {
      const ingressKey = getResourceKey(ingress)

      for (const backend of getServiceBackends(ingress)) {
        const serviceKey = `${getNamespace(ingress)}/${backend.name}`
        const service = services.get(serviceKey)
        const port = backend.port?.number ?? backend.port?.name ?? ''

        if (!service) {
          recorder.event(
            ingress,
            EventType.Warning,
            EventReason.ServiceNotFound,
            `Service ${serviceKey} referenced by ingress ${ingressKey} not found`
          )
        } else if (!findServicePort(service, backend.port ?? {})) {
          const message = `Ingress ${ingressKey} references port ${port} which is not exposed by service ${serviceKey}`

          recorder.event(ingress, EventType.Warning, EventReason.PortResolutionError, message)

          throw new ValidationError(message, EventReason.PortResolutionError, ingress)
        }
      }
    }
  },
}
