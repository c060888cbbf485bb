import { V1Probe }                    from '@kubernetes/client-node'
import { V1Service }                  from '@kubernetes/client-node'
import { V1ServicePort }              from '@kubernetes/client-node'

import { ApplicationGateway }         from '@appgw-ingress/gateway-api'
import { ApplicationGatewayProbe }    from '@appgw-ingress/gateway-api'
import { ApplicationGatewayProtocol } from '@appgw-ingress/gateway-api'
import { K8sContext }                 from '@appgw-ingress/k8s-context'
import { mergeByName }                from '@appgw-ingress/k8s-brownfield'

import { ConfigBuilderContext }       from './config-builder.interfaces'
import { StageContext }               from './config-builder.interfaces'
import { BackendIdentifier }          from './identifiers'
import { collectBackendIds }          from './ingress.utils'
import { defaultProbe }               from './defaults'
import { findServicePort }            from './port-resolver'
import { generateProbeName }          from './naming'
import { getBackendProtocol }         from './annotations'
import { getEndpoints }               from './port-resolver'
import { getNamespace }               from './identifiers'
import { getService }                 from './port-resolver'
import { getTargetPort }              from './port-resolver'

export interface HealthProbesResult {
  probesByBackend: Map<string, ApplicationGatewayProbe>
}

export const getProbeForServiceContainer = (
  k8sContext: K8sContext,
  service: V1Service,
  servicePort: V1ServicePort
): V1Probe | undefined => {
  const targetPort = getTargetPort(servicePort)
  const pods = k8sContext.getPodsByServiceSelector(getNamespace(service), service.spec?.selector)

  for (const pod of pods) {
    for (const container of pod.spec?.containers ?? []) {
      const serves = (container.ports ?? []).some(
        (port) => String(port.containerPort) === targetPort || port.name === targetPort
      )

      if (serves) {
        if (container.readinessProbe?.httpGet) {
          return container.readinessProbe
        }

        if (container.livenessProbe?.httpGet) {
          return container.livenessProbe
        }
      }
    }
  }

  return undefined
}

const hasEndpointAddresses = (stage: StageContext, backendId: BackendIdentifier): boolean =>
  (getEndpoints(stage.k8sContext, backendId)?.subsets ?? []).some(
    (subset) => (subset.addresses ?? []).length > 0
  )

const getProbePath = (path?: string): string => {
  const trimmed = (path ?? '').replace(/\*$/, '')

  return trimmed || '/'
}

const generateHealthProbe = (
  stage: StageContext,
  backendId: BackendIdentifier
): ApplicationGatewayProbe | undefined => {
  const service = getService(stage.k8sContext, backendId)

  if (!service) {
    return undefined
  }

  const servicePort = findServicePort(service, backendId.backend.port ?? {})

  if (!servicePort || !hasEndpointAddresses(stage, backendId)) {
    return undefined
  }

  const probe = defaultProbe(stage.gatewayIdentifier, generateProbeName(backendId))

  probe.properties.protocol = getBackendProtocol(backendId.ingress) ?? probe.properties.protocol

  if (backendId.rule?.host) {
    probe.properties.host = backendId.rule.host
  }

  probe.properties.path = getProbePath(backendId.path?.path)

  const containerProbe = getProbeForServiceContainer(stage.k8sContext, service, servicePort)

  if (containerProbe?.httpGet) {
    const { httpGet } = containerProbe

    if (httpGet.host) {
      probe.properties.host = httpGet.host
    }

    if (httpGet.path) {
      probe.properties.path = httpGet.path
    }

    if (httpGet.scheme?.toUpperCase() === 'HTTPS') {
      probe.properties.protocol = ApplicationGatewayProtocol.Https
    }

    if (containerProbe.periodSeconds) {
      probe.properties.interval = containerProbe.periodSeconds
    }

    if (containerProbe.timeoutSeconds) {
      probe.properties.timeout = containerProbe.timeoutSeconds
    }

    if (containerProbe.failureThreshold) {
      probe.properties.unhealthyThreshold = containerProbe.failureThreshold
    }
  }

  return probe
}

export const generateHealthProbes = (
  stage: StageContext,
  gateway: ApplicationGateway,
  cbCtx: ConfigBuilderContext
): HealthProbesResult => {
  const defaultHealthProbe = defaultProbe(stage.gatewayIdentifier)
  const probes = new Map<string, ApplicationGatewayProbe>([[defaultHealthProbe.name, defaultHealthProbe]])
  const probesByBackend = new Map<string, ApplicationGatewayProbe>()

  for (const backendId of collectBackendIds(cbCtx)) {
    const probe = generateHealthProbe(stage, backendId)

    if (probe) {
      probes.set(probe.name, probe)
      probesByBackend.set(backendId.key, probe)
    }
  }

  const preserved: Array<ApplicationGatewayProbe> = stage.existing?.getBlacklistedProbes()[0] ?? []

  gateway.properties.probes = mergeByName(preserved, [...probes.values()])

  return { probesByBackend }
}
