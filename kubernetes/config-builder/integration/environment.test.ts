import { loadEnvVariables } from '../src/environment'
import { formatBuildInfo }  from '../src/version'
import { getBuildInfo }     from '../src/version'

describe('config-builder', () => {
  describe('environment', () => {
    const required = {
      APPGW_SUBSCRIPTION_ID: 'test-subscription',
      APPGW_RESOURCE_GROUP: 'test-resource-group',
      APPGW_NAME: 'test-gateway',
    }

    it('load defaults', () => {
      expect(loadEnvVariables(required)).toEqual({
        subscriptionId: 'test-subscription',
        resourceGroupName: 'test-resource-group',
        gatewayName: 'test-gateway',
        watchNamespace: undefined,
        usePrivateIp: false,
        enableBrownfieldDeployment: false,
        enableIstioIntegration: false,
        armEndpoint: 'https://management.azure.com',
        armAccessToken: undefined,
      })
    })

    it('load flags and endpoint', () => {
      const env = loadEnvVariables({
        ...required,
        WATCH_NAMESPACE: 'apps',
        USE_PRIVATE_IP: 'true',
        APPGW_ENABLE_BROWNFIELD_DEPLOYMENT: 'TRUE',
        APPGW_ENABLE_ISTIO_INTEGRATION: 'false',
        ARM_ENDPOINT: 'http://localhost:8080/',
        ARM_ACCESS_TOKEN: 'test-secret',
      })

      expect(env.watchNamespace).toBe('apps')
      expect(env.usePrivateIp).toBe(true)
      expect(env.enableBrownfieldDeployment).toBe(true)
      expect(env.enableIstioIntegration).toBe(false)
      expect(env.armEndpoint).toBe('http://localhost:8080')
      expect(env.armAccessToken).toBe('test-secret')
    })

    it('require gateway coordinates', () => {
      expect(() => loadEnvVariables({ APPGW_SUBSCRIPTION_ID: 'test-subscription' })).toThrow(
        'Environment variable APPGW_RESOURCE_GROUP is required'
      )
    })

    it('format build info', () => {
      expect(formatBuildInfo(getBuildInfo({}))).toBe('latest/unknown/unknown')
      expect(
        formatBuildInfo(getBuildInfo({ BUILD_VERSION: '1.2.0', BUILD_GIT_COMMIT: 'abc', BUILD_DATE: '2026-10-19' }))
      ).toBe('1.2.0/abc/2026-10-19')
    })
  })
})
