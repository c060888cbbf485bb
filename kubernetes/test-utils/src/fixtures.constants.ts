export const Namespace = 'test-ingress-controller'

export const IngressName = 'hello-world-ingress'

export const ServiceName = 'hello-world'

export const Host = 'bye.com'

export const OtherHost = 'hello.com'

export const PathHi = '/hi'

export const ServiceHttpPortName = 'http'

export const ServiceHttpsPortName = 'https'

export const ContainerPortName = 'backend-http'

export const ContainerPort = 8080

export const HttpsTargetPort = 8443

export const SelectorKey = 'app'

export const SelectorValue = 'frontend'

export const ReadinessProbePath = '/healthz'

export const SubscriptionId = 'test-subscription'

export const ResourceGroup = 'test-resource-group'

export const GatewayName = 'test-gateway'

export const PublicIpName = 'public-ip'

export const PrivateIpName = 'private-ip'

export const PrivateIpAddress = '10.0.0.10'
