import { ApplicationGateway }     from '@appgw-ingress/gateway-api'

import { BuildInfo }              from './version'
import { ManagedByK8sIngressTag } from './config-builder.constants'
import { formatBuildInfo }        from './version'

export const addTags = (gateway: ApplicationGateway, buildInfo: BuildInfo) => {
  gateway.tags = {
    ...gateway.tags,
    [ManagedByK8sIngressTag]: formatBuildInfo(buildInfo),
  }
}
