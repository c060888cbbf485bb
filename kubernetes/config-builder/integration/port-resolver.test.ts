import { K8sContext }                 from '@appgw-ingress/k8s-context'
import { Namespace }                  from '@appgw-ingress/k8s-test-utils'
import { ServiceName }                from '@appgw-ingress/k8s-test-utils'
import { newServiceFixture }          from '@appgw-ingress/k8s-test-utils'
import { newVirtualServiceFixture }   from '@appgw-ingress/k8s-test-utils'

import { ServiceIdentifier }          from '../src/identifiers'
import { generateIstioDestinationId } from '../src/identifiers'
import { newK8sContextFixture }       from './config-builder.fixtures'
import { resolveIstioPortName }       from '../src/port-resolver'
import { resolvePortName }            from '../src/port-resolver'
import { resolveServiceBackendPorts } from '../src/port-resolver'

describe('config-builder', () => {
  describe('port resolver', () => {
    let k8sContext: K8sContext

    const serviceId = new ServiceIdentifier(Namespace, ServiceName)

    beforeEach(() => {
      k8sContext = newK8sContextFixture()
    })

    it('resolve named port from endpoints', () => {
      expect(resolvePortName(k8sContext, 'backend-http', serviceId)).toEqual(new Set([8080]))
    })

    it('return empty set for unknown port name', () => {
      expect(resolvePortName(k8sContext, 'unknown', serviceId).size).toBe(0)
    })

    it('return empty set for missing endpoints', () => {
      expect(resolvePortName(k8sContext, 'backend-http', new ServiceIdentifier(Namespace, 'missing')).size).toBe(0)
    })

    it('return empty set for invalid cache key', () => {
      expect(resolvePortName(k8sContext, 'backend-http', new ServiceIdentifier('', ServiceName)).size).toBe(0)
    })

    it('resolve istio destination port name', () => {
      const virtualService = newVirtualServiceFixture()
      const destinationId = generateIstioDestinationId(virtualService, virtualService.spec.http[0].route[0].destination)

      expect(resolveIstioPortName(k8sContext, 'backend-http', destinationId)).toEqual(new Set([8080]))
    })

    it('resolve service port through named target port', () => {
      expect(resolveServiceBackendPorts(k8sContext, serviceId, newServiceFixture(), { number: 80 })).toEqual([
        { servicePort: 80, backendPort: 8080 },
      ])
      expect(resolveServiceBackendPorts(k8sContext, serviceId, newServiceFixture(), { name: 'http' })).toEqual([
        { servicePort: 80, backendPort: 8080 },
      ])
    })

    it('resolve service port through numeric target port', () => {
      expect(resolveServiceBackendPorts(k8sContext, serviceId, newServiceFixture(), { number: 8443 })).toEqual([
        { servicePort: 443, backendPort: 8443 },
      ])
    })

    it('fall back to backend port for missing service', () => {
      expect(resolveServiceBackendPorts(k8sContext, serviceId, undefined, { number: 80 })).toEqual([
        { servicePort: 80, backendPort: 80 },
      ])
      expect(resolveServiceBackendPorts(k8sContext, serviceId, undefined, { name: 'http' })).toEqual([])
    })

    it('return no pairs for port not exposed by service', () => {
      expect(resolveServiceBackendPorts(k8sContext, serviceId, newServiceFixture(), { number: 9999 })).toEqual([])
    })
  })
})
