import { V1Ingress }                  from '@kubernetes/client-node'

import { ApplicationGatewayProtocol } from '@appgw-ingress/gateway-api'

import { getBackendPathPrefix }       from '../src/annotations'
import { getBackendProtocol }         from '../src/annotations'
import { getOverrideFrontendPort }    from '../src/annotations'
import { getRequestTimeout }          from '../src/annotations'
import { isCookieBasedAffinity }      from '../src/annotations'

const withAnnotations = (annotations: Record<string, string>): V1Ingress => ({
  metadata: { name: 'annotated', annotations },
})

describe('config-builder', () => {
  describe('annotations', () => {
    it('read backend annotations', () => {
      const ingress = withAnnotations({
        'appgw.ingress.kubernetes.io/backend-path-prefix': '/api/',
        'appgw.ingress.kubernetes.io/cookie-based-affinity': 'True',
        'appgw.ingress.kubernetes.io/request-timeout': '45',
        'appgw.ingress.kubernetes.io/backend-protocol': 'HTTPS',
      })

      expect(getBackendPathPrefix(ingress)).toBe('/api/')
      expect(isCookieBasedAffinity(ingress)).toBe(true)
      expect(getRequestTimeout(ingress)).toBe(45)
      expect(getBackendProtocol(ingress)).toBe(ApplicationGatewayProtocol.Https)
    })

    it('ignore malformed values', () => {
      const ingress = withAnnotations({
        'appgw.ingress.kubernetes.io/request-timeout': 'soon',
        'appgw.ingress.kubernetes.io/backend-protocol': 'grpc',
        'appgw.ingress.kubernetes.io/override-frontend-port': '70000',
      })

      expect(getRequestTimeout(ingress)).toBeUndefined()
      expect(getBackendProtocol(ingress)).toBeUndefined()
      expect(getOverrideFrontendPort(ingress)).toBeUndefined()
      expect(isCookieBasedAffinity(ingress)).toBe(false)
    })

    it('read frontend port override', () => {
      expect(
        getOverrideFrontendPort(withAnnotations({ 'appgw.ingress.kubernetes.io/override-frontend-port': '8080' }))
      ).toBe(8080)
    })
  })
})
