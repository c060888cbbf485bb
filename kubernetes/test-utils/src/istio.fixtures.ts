import { VirtualServiceResource } from '@appgw-ingress/k8s-istio-api'

import { Namespace }              from './fixtures.constants'
import { ServiceName }            from './fixtures.constants'

export const newVirtualServiceFixture = (): VirtualServiceResource => ({
  apiVersion: 'networking.istio.io/v1alpha3',
  kind: 'VirtualService',
  metadata: {
    name: 'hello-world-vs',
    namespace: Namespace,
  },
  spec: {
    hosts: ['mesh.com'],
    gateways: ['istio-gateway'],
    http: [
      {
        match: [{ uri: { prefix: '/api' } }, { uri: { exact: '/status' } }],
        route: [
          {
            destination: {
              host: ServiceName,
              port: { number: 443 },
            },
          },
        ],
      },
    ],
  },
})
