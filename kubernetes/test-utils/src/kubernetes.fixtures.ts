import { V1Endpoints }          from '@kubernetes/client-node'
import { V1Ingress }            from '@kubernetes/client-node'
import { V1Pod }                from '@kubernetes/client-node'
import { V1Service }            from '@kubernetes/client-node'

import { ContainerPort }        from './fixtures.constants'
import { ContainerPortName }    from './fixtures.constants'
import { Host }                 from './fixtures.constants'
import { HttpsTargetPort }      from './fixtures.constants'
import { IngressName }          from './fixtures.constants'
import { Namespace }            from './fixtures.constants'
import { OtherHost }            from './fixtures.constants'
import { PathHi }               from './fixtures.constants'
import { ReadinessProbePath }   from './fixtures.constants'
import { SelectorKey }          from './fixtures.constants'
import { SelectorValue }        from './fixtures.constants'
import { ServiceHttpPortName }  from './fixtures.constants'
import { ServiceHttpsPortName } from './fixtures.constants'
import { ServiceName }          from './fixtures.constants'

/**
 * Ingress with two hosts, both routing /hi to the same service on ports 80 and 443.
 */
export const newIngressFixture = (): V1Ingress => ({
  apiVersion: 'networking.k8s.io/v1',
  kind: 'Ingress',
  metadata: {
    name: IngressName,
    namespace: Namespace,
    annotations: {
      'kubernetes.io/ingress.class': 'azure/application-gateway',
    },
  },
  spec: {
    rules: [
      {
        host: Host,
        http: {
          paths: [
            {
              path: PathHi,
              pathType: 'Prefix',
              backend: {
                service: {
                  name: ServiceName,
                  port: { number: 80 },
                },
              },
            },
          ],
        },
      },
      {
        host: OtherHost,
        http: {
          paths: [
            {
              path: PathHi,
              pathType: 'Prefix',
              backend: {
                service: {
                  name: ServiceName,
                  port: { number: 443 },
                },
              },
            },
          ],
        },
      },
    ],
  },
})

export const newServiceFixture = (): V1Service => ({
  apiVersion: 'v1',
  kind: 'Service',
  metadata: {
    name: ServiceName,
    namespace: Namespace,
  },
  spec: {
    selector: {
      [SelectorKey]: SelectorValue,
    },
    ports: [
      {
        name: ServiceHttpPortName,
        protocol: 'TCP',
        port: 80,
        targetPort: ContainerPortName,
      },
      {
        name: ServiceHttpsPortName,
        protocol: 'TCP',
        port: 443,
        targetPort: HttpsTargetPort,
      },
    ],
  },
})

export const newEndpointsFixture = (): V1Endpoints => ({
  apiVersion: 'v1',
  kind: 'Endpoints',
  metadata: {
    name: ServiceName,
    namespace: Namespace,
  },
  subsets: [
    {
      addresses: [{ ip: '10.9.8.7' }, { ip: '10.9.8.6' }],
      ports: [
        {
          name: ContainerPortName,
          port: ContainerPort,
          protocol: 'TCP',
        },
        {
          name: ServiceHttpsPortName,
          port: HttpsTargetPort,
          protocol: 'TCP',
        },
      ],
    },
  ],
})

export const newPodFixture = (name = 'hello-world-pod'): V1Pod => ({
  apiVersion: 'v1',
  kind: 'Pod',
  metadata: {
    name,
    namespace: Namespace,
    labels: {
      [SelectorKey]: SelectorValue,
    },
  },
  spec: {
    containers: [
      {
        name: 'container',
        image: 'nginx',
        ports: [
          {
            name: ContainerPortName,
            containerPort: ContainerPort,
          },
        ],
        readinessProbe: {
          httpGet: {
            path: ReadinessProbePath,
            port: ContainerPort,
          },
          periodSeconds: 20,
          timeoutSeconds: 5,
          failureThreshold: 3,
        },
      },
    ],
  },
})
