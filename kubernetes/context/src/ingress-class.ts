import { V1Ingress } from '@kubernetes/client-node'

export const INGRESS_CLASS_ANNOTATION = 'kubernetes.io/ingress.class'

export const APPLICATION_GATEWAY_INGRESS_CLASS = 'azure/application-gateway'

export const APPLICATION_GATEWAY_INGRESS_CLASS_NAME = 'azure-application-gateway'

export const isApplicationGatewayIngress = (ingress: V1Ingress): boolean =>
  ingress.metadata?.annotations?.[INGRESS_CLASS_ANNOTATION] === APPLICATION_GATEWAY_INGRESS_CLASS ||
  ingress.spec?.ingressClassName === APPLICATION_GATEWAY_INGRESS_CLASS_NAME
