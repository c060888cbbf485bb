import { ApplicationGatewayHttpListener } from '@appgw-ingress/gateway-api'
import { ApplicationGatewayProtocol }     from '@appgw-ingress/gateway-api'
import { BasicListenerName }              from '@appgw-ingress/k8s-test-utils'
import { DefaultListenerName }            from '@appgw-ingress/k8s-test-utils'
import { PathBasedListenerName1 }         from '@appgw-ingress/k8s-test-utils'
import { PathBasedListenerName2 }         from '@appgw-ingress/k8s-test-utils'
import { newApplicationGatewayFixture }   from '@appgw-ingress/k8s-test-utils'
import { newGatewayIdentifierFixture }    from '@appgw-ingress/k8s-test-utils'
import { newProhibitedTargetFixture }     from '@appgw-ingress/k8s-test-utils'

import { ExistingResources }              from '../src/existing-resources'
import { mergeByName }                    from '../src/existing-resources'
import { mergeListeners }                 from '../src/existing-resources'

const names = (items: Array<{ name: string }>): Array<string> => items.map((item) => item.name)

describe('brownfield', () => {
  describe('existing resources', () => {
    const hostAndPaths = newProhibitedTargetFixture('prohibit-bye', 'bye.com', ['/fox', '/bar'])

    it('blacklist listeners matching host and paths', () => {
      const existing = new ExistingResources(newApplicationGatewayFixture(), [hostAndPaths])

      const [blacklisted, nonBlacklisted] = existing.getBlacklistedListeners()

      expect(names(blacklisted)).toEqual([PathBasedListenerName1, PathBasedListenerName2, BasicListenerName])
      expect(names(nonBlacklisted)).toEqual([DefaultListenerName])
    })

    it('blacklist only host level listener for hostname without paths', () => {
      const existing = new ExistingResources(newApplicationGatewayFixture(), [
        newProhibitedTargetFixture('prohibit-bye', 'bye.com'),
      ])

      const [blacklisted, nonBlacklisted] = existing.getBlacklistedListeners()

      expect(names(blacklisted)).toEqual([BasicListenerName])
      expect(names(nonBlacklisted)).toEqual([
        DefaultListenerName,
        PathBasedListenerName1,
        PathBasedListenerName2,
      ])
    })

    it('blacklist every listener for empty prohibited target', () => {
      const existing = new ExistingResources(newApplicationGatewayFixture(), [
        hostAndPaths,
        newProhibitedTargetFixture('prohibit-all'),
      ])

      const [blacklisted, nonBlacklisted] = existing.getBlacklistedListeners()

      expect(blacklisted).toHaveLength(4)
      expect(nonBlacklisted).toHaveLength(0)
    })

    it('blacklist nothing without prohibited targets', () => {
      const existing = new ExistingResources(newApplicationGatewayFixture(), [])

      const [blacklisted, nonBlacklisted] = existing.getBlacklistedListeners()

      expect(blacklisted).toHaveLength(0)
      expect(nonBlacklisted).toHaveLength(4)
    })

    it('partition every existing listener exactly once', () => {
      const gateway = newApplicationGatewayFixture()
      const existing = new ExistingResources(gateway, [hostAndPaths])

      const [blacklisted, nonBlacklisted] = existing.getBlacklistedListeners()
      const all = [...names(blacklisted), ...names(nonBlacklisted)]

      expect(new Set(all).size).toBe(all.length)
      expect(all.sort()).toEqual(names(gateway.properties.httpListeners ?? []).sort())
    })

    it('use provided listeners index', () => {
      const gateway = newApplicationGatewayFixture()
      const basic = (gateway.properties.httpListeners ?? []).filter(
        (listener) => listener.name === BasicListenerName
      )
      const index = new Map(basic.map((listener) => [listener.name, listener]))

      const existing = new ExistingResources(gateway, [hostAndPaths], index)

      expect(existing.getListenersByName()).toBe(index)
      expect([...existing.getBlacklistedListenersSet()]).toEqual([BasicListenerName])
      expect(names(existing.getBlacklistedListeners()[0])).toEqual([BasicListenerName])
    })

    it('build listeners index lazily once', () => {
      const existing = new ExistingResources(newApplicationGatewayFixture(), [])

      const index = existing.getListenersByName()

      expect([...index.keys()]).toEqual([
        DefaultListenerName,
        PathBasedListenerName1,
        PathBasedListenerName2,
        BasicListenerName,
      ])
      expect(existing.getListenersByName()).toBe(index)
    })

    it('derive blacklisted objects from blacklisted listeners', () => {
      const existing = new ExistingResources(newApplicationGatewayFixture(), [hostAndPaths])

      expect(names(existing.getBlacklistedRoutingRules()[0])).toEqual([
        'RequestRoutingRule-1',
        'RequestRoutingRule-2',
        'RequestRoutingRule-Basic',
      ])
      expect(names(existing.getBlacklistedRoutingRules()[1])).toEqual(['RequestRoutingRule-Default'])
      expect(names(existing.getBlacklistedUrlPathMaps()[0])).toEqual(['URLPathMap-1', 'URLPathMap-2'])
      expect(names(existing.getBlacklistedBackendPools()[0])).toEqual([
        'BackendAddressPool-1',
        'BackendAddressPool-2',
        'BackendAddressPool-Basic',
      ])
      expect(names(existing.getBlacklistedHttpSettings()[1])).toEqual(['BackendHTTPSettings-Default'])
      expect(names(existing.getBlacklistedProbes()[0])).toEqual(['Probe-1', 'Probe-2'])
      expect(names(existing.getBlacklistedProbes()[1])).toEqual(['Probe-Default'])
      expect(names(existing.getBlacklistedFrontendPorts()[0])).toEqual(['fp-80', 'fp-8080', 'fp-8081'])
    })
  })

  describe('merge', () => {
    it('prefer preserved objects by name', () => {
      const merged = mergeByName(
        [
          { name: 'b', value: 1 },
          { name: 'a', value: 1 },
        ],
        [
          { name: 'a', value: 2 },
          { name: 'c', value: 2 },
        ]
      )

      expect(merged).toEqual([
        { name: 'a', value: 1 },
        { name: 'b', value: 1 },
        { name: 'c', value: 2 },
      ])
    })

    it('drop generated listeners claiming preserved port and host', () => {
      const identifier = newGatewayIdentifierFixture()
      const gateway = newApplicationGatewayFixture()
      const preserved = (gateway.properties.httpListeners ?? []).filter(
        (listener) => listener.name === BasicListenerName
      )
      const generated = (name: string, hostName: string): ApplicationGatewayHttpListener => ({
        id: identifier.listenerId(name),
        name,
        properties: {
          frontendIPConfiguration: { id: identifier.frontendIpConfigurationId('public-ip') },
          frontendPort: { id: identifier.frontendPortId('fp-80') },
          protocol: ApplicationGatewayProtocol.Http,
          hostName,
        },
      })

      const merged = mergeListeners(preserved, [
        generated('k8s-ag-ingress-fl-bye.com-80', 'bye.com'),
        generated('k8s-ag-ingress-fl-hello.com-80', 'hello.com'),
      ])

      expect(names(merged)).toEqual([BasicListenerName, 'k8s-ag-ingress-fl-hello.com-80'])
    })

    it('match preserved listener hosts case-insensitively', () => {
      const identifier = newGatewayIdentifierFixture()
      const gateway = newApplicationGatewayFixture()
      const preserved = (gateway.properties.httpListeners ?? []).filter(
        (listener) => listener.name === BasicListenerName
      )

      const merged = mergeListeners(preserved, [
        {
          id: identifier.listenerId('k8s-ag-ingress-fl-Bye.COM-80'),
          name: 'k8s-ag-ingress-fl-Bye.COM-80',
          properties: {
            frontendIPConfiguration: { id: identifier.frontendIpConfigurationId('public-ip') },
            frontendPort: { id: identifier.frontendPortId('fp-80') },
            protocol: ApplicationGatewayProtocol.Http,
            hostName: 'Bye.COM',
          },
        },
      ])

      expect(names(merged)).toEqual([BasicListenerName])
    })
  })
})
