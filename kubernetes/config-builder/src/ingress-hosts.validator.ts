import { EventReason }       from '@appgw-ingress/k8s-event-recorder'
import { EventType }         from '@appgw-ingress/k8s-event-recorder'
import { getResourceKey }    from '@appgw-ingress/k8s-context'

import { ValidationContext } from './config-builder.interfaces'
import { Validator }         from './config-builder.interfaces'
import { ValidationError }   from './config-builder.errors'

export const ingressHostsValidator: Validator = {
  name: 'ingress-hosts',

  validate({ recorder, ingressList }: ValidationContext) {
    for (const ingress of ingressList) {
      const wildcard = (ingress.spec?.rules ?? []).find((rule) => rule.host?.includes('*'))

      if (wildcard) {
        const message = `Ingress ${getResourceKey(ingress)} uses wildcard host ${wildcard.host}, which is not supported`

        recorder.event(ingress, EventType.Warning, EventReason.InvalidIngress, message)

        throw new ValidationError(message, EventReason.InvalidIngress, ingress)
      }
    }
  },
}
