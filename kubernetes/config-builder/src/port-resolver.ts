import { V1Endpoints }                from '@kubernetes/client-node'
import { V1Service }                  from '@kubernetes/client-node'
import { V1ServicePort }              from '@kubernetes/client-node'

import { K8sContext }                 from '@appgw-ingress/k8s-context'
import { Logger }                     from '@appgw-ingress/logger'

import { IstioDestinationIdentifier } from './identifiers'
import { ServiceIdentifier }          from './identifiers'

export interface ServiceBackendPortPair {
  servicePort: number
  backendPort: number
}

export interface ServiceBackendPort {
  number?: number
  name?: string
}

const logger = new Logger('PortResolver')

const isTcp = ({ protocol }: { protocol?: string }): boolean => !protocol || protocol === 'TCP'

export const getEndpoints = (
  k8sContext: K8sContext,
  serviceId: ServiceIdentifier
): V1Endpoints | undefined => {
  try {
    return k8sContext.getEndpointsByService(serviceId.serviceKey)
  } catch (error) {
    logger.error('Could not fetch endpoints by service key from cache', {
      serviceKey: serviceId.serviceKey,
      err: error,
    })

    return undefined
  }
}

export const getService = (k8sContext: K8sContext, serviceId: ServiceIdentifier): V1Service | undefined => {
  try {
    return k8sContext.getService(serviceId.serviceKey)
  } catch (error) {
    logger.error('Could not fetch service by service key from cache', {
      serviceKey: serviceId.serviceKey,
      err: error,
    })

    return undefined
  }
}

export const resolvePortName = (
  k8sContext: K8sContext,
  portName: string,
  serviceId: ServiceIdentifier
): Set<number> => {
  const resolvedPorts = new Set<number>()
  const endpoints = getEndpoints(k8sContext, serviceId)

  for (const subset of endpoints?.subsets ?? []) {
    for (const port of subset.ports ?? []) {
      if (port.name === portName) {
        resolvedPorts.add(port.port)
      }
    }
  }

  return resolvedPorts
}

export const resolveIstioPortName = (
  k8sContext: K8sContext,
  portName: string,
  destinationId: IstioDestinationIdentifier
): Set<number> => resolvePortName(k8sContext, portName, destinationId)

export const findServicePort = (
  service: V1Service,
  { number, name }: ServiceBackendPort
): V1ServicePort | undefined => {
  const requested = String(number ?? name ?? '')

  if (!requested) {
    return undefined
  }

  return (service.spec?.ports ?? []).find(
    (servicePort) =>
      isTcp(servicePort) &&
      (String(servicePort.port) === requested ||
        servicePort.name === requested ||
        (servicePort.targetPort !== undefined && String(servicePort.targetPort) === requested))
  )
}

export const getTargetPort = (servicePort: V1ServicePort): string => {
  const targetPort = servicePort.targetPort === undefined ? '' : String(servicePort.targetPort)

  return targetPort || String(servicePort.port)
}

export const resolveServiceBackendPorts = (
  k8sContext: K8sContext,
  serviceId: ServiceIdentifier,
  service: V1Service | undefined,
  port: ServiceBackendPort
): Array<ServiceBackendPortPair> => {
  const pairs = new Map<string, ServiceBackendPortPair>()

  const add = (servicePort: number, backendPort: number) =>
    pairs.set(`${servicePort}:${backendPort}`, { servicePort, backendPort })

  if (!service) {
    if (port.number !== undefined) {
      add(port.number, port.number)
    }

    return [...pairs.values()]
  }

  const servicePort = findServicePort(service, port)

  if (servicePort) {
    const targetPort = getTargetPort(servicePort)

    if (/^\d+$/.test(targetPort)) {
      add(servicePort.port, Number(targetPort))
    } else {
      resolvePortName(k8sContext, targetPort, serviceId).forEach((resolved) =>
        add(servicePort.port, resolved))
    }
  }

  return [...pairs.values()]
}
