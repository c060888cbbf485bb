import { ApplicationGatewayIdentifier } from '../src/gateway.identifier'
import { getLastChunkOfSlashed }        from '../src/gateway.identifier'

describe('gateway.identifier', () => {
  const identifier = new ApplicationGatewayIdentifier('subscription', 'resource-group', 'gateway')

  it('builds the gateway resource id', () => {
    expect(identifier.gatewayId()).toBe(
      '/subscriptions/subscription/resourceGroups/resource-group/providers/Microsoft.Network/applicationGateways/gateway'
    )
  })

  it('builds child resource ids', () => {
    expect(identifier.probeId('probe')).toBe(`${identifier.gatewayId()}/probes/probe`)
    expect(identifier.httpSettingsId('settings')).toBe(
      `${identifier.gatewayId()}/backendHttpSettingsCollection/settings`
    )
    expect(identifier.pathRuleId('url', 'rule')).toBe(
      `${identifier.gatewayId()}/urlPathMaps/url/pathRules/rule`
    )
  })

  it('extracts the object name from a resource id', () => {
    expect(getLastChunkOfSlashed(identifier.listenerId('fl-80'))).toBe('fl-80')
  })
})
