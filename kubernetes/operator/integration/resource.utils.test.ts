import { ResourceEventType }   from '../src/operator.enums'
import { getResourceApiUri }   from '../src/resource.utils'
import { toResourceEventType } from '../src/resource.utils'

describe('operator', () => {
  describe('resource utils', () => {
    it('should build core api uri', () => {
      expect(getResourceApiUri('', 'v1', 'services')).toBe('/api/v1/services')
    })

    it('should build namespaced group api uri', () => {
      expect(getResourceApiUri('networking.istio.io', 'v1alpha3', 'virtualservices', 'mesh')).toBe(
        '/apis/networking.istio.io/v1alpha3/namespaces/mesh/virtualservices'
      )
    })

    it('should map watch phases to event types', () => {
      expect(toResourceEventType('ADDED')).toBe(ResourceEventType.Added)
      expect(toResourceEventType('MODIFIED')).toBe(ResourceEventType.Modified)
      expect(toResourceEventType('DELETED')).toBe(ResourceEventType.Deleted)
      expect(toResourceEventType('BOOKMARK')).toBeUndefined()
    })
  })
})
