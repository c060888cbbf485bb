import { ApplicationGatewayProtocol } from '@appgw-ingress/gateway-api'
import { newIngressFixture }          from '@appgw-ingress/k8s-test-utils'
import { newVirtualServiceFixture }   from '@appgw-ingress/k8s-test-utils'

import { ListenerIdentifier }         from '../src/identifiers'
import { ServiceIdentifier }          from '../src/identifiers'
import { generateBackendId }          from '../src/identifiers'
import { generateIstioDestinationId } from '../src/identifiers'
import { generateIstioMatchId }       from '../src/identifiers'
import { generateListenerId }         from '../src/identifiers'

describe('config-builder', () => {
  describe('identifiers', () => {
    it('derive listener port from protocol', () => {
      expect(generateListenerId(undefined, ApplicationGatewayProtocol.Http).frontendPort).toBe(80)
      expect(generateListenerId(undefined, ApplicationGatewayProtocol.Https).frontendPort).toBe(443)
      expect(generateListenerId({ host: 'bye.com' }, ApplicationGatewayProtocol.Https, 8443)).toEqual(
        new ListenerIdentifier(8443, 'bye.com')
      )
    })

    it('compare listeners by port and host', () => {
      expect(new ListenerIdentifier(80, 'bye.com').equals(new ListenerIdentifier(80, 'bye.com'))).toBe(true)
      expect(new ListenerIdentifier(80, 'bye.com').equals(new ListenerIdentifier(443, 'bye.com'))).toBe(false)
      expect(new ListenerIdentifier(80).key).toBe('80|')
    })

    it('build service keys', () => {
      const serviceId = new ServiceIdentifier('default', 'web')

      expect(serviceId.serviceKey).toBe('default/web')
      expect(serviceId.serviceFullName).toBe('default-web')
      expect(serviceId.equals(new ServiceIdentifier('default', 'web'))).toBe(true)
      expect(serviceId.equals(new ServiceIdentifier('other', 'web'))).toBe(false)
    })

    it('build backend identifier from ingress', () => {
      const ingress = newIngressFixture()
      const [rule] = ingress.spec?.rules ?? []
      const [path] = rule.http?.paths ?? []
      const backendId = generateBackendId(ingress, rule, path, { name: 'hello-world', port: { number: 80 } })

      expect(backendId.serviceKey).toBe('test-ingress-controller/hello-world')
      expect(backendId.servicePort).toBe('80')
      expect(backendId.key).toBe('test-ingress-controller/hello-world|hello-world-ingress|bye.com|/hi|80')
    })

    it('build istio identifiers', () => {
      const virtualService = newVirtualServiceFixture()
      const [http] = virtualService.spec.http
      const [match] = http.match ?? []
      const destinationId = generateIstioDestinationId(virtualService, http.route[0].destination)
      const matchId = generateIstioMatchId(
        virtualService,
        http,
        match,
        http.route.map((route) => route.destination)
      )

      expect(destinationId.serviceKey).toBe('test-ingress-controller/hello-world')
      expect(destinationId.servicePort).toBe('443')
      expect(matchId.namespace).toBe('test-ingress-controller')
      expect(matchId.gateways).toEqual(['istio-gateway'])
      expect(matchId.virtualServiceName).toBe('hello-world-vs')
    })
  })
})
