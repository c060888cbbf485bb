import { Validator }                  from './config-builder.interfaces'
import { gatewayLimitsValidator }     from './gateway-limits.validator'
import { ingressHostsValidator }      from './ingress-hosts.validator'
import { serviceDefinitionValidator } from './service-definition.validator'
import { urlPathMapsValidator }       from './url-path-maps.validator'

export const defaultPreBuildValidators: Array<Validator> = [serviceDefinitionValidator, ingressHostsValidator]

export const defaultPostBuildValidators: Array<Validator> = [urlPathMapsValidator, gatewayLimitsValidator]
