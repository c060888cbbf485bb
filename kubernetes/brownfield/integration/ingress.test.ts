import { V1Ingress }                  from '@kubernetes/client-node'

import { Host }                       from '@appgw-ingress/k8s-test-utils'
import { OtherHost }                  from '@appgw-ingress/k8s-test-utils'
import { newIngressFixture }          from '@appgw-ingress/k8s-test-utils'
import { newProhibitedTargetFixture } from '@appgw-ingress/k8s-test-utils'

import { pruneIngressRules }          from '../src/ingress'

describe('brownfield', () => {
  describe('prune ingress rules', () => {
    it('keep every rule without prohibited targets', () => {
      const ingress = newIngressFixture()

      expect(pruneIngressRules(ingress, [])).toEqual(ingress.spec?.rules)
    })

    it('drop rule whose paths are all prohibited', () => {
      const rules = pruneIngressRules(newIngressFixture(), [
        newProhibitedTargetFixture('prohibit-hi', Host, ['/hi']),
      ])

      expect(rules.map((rule) => rule.host)).toEqual([OtherHost])
    })

    it('drop every rule for universal prohibition', () => {
      expect(pruneIngressRules(newIngressFixture(), [newProhibitedTargetFixture('prohibit-all')])).toEqual([])
    })

    it('drop pathless rule for prohibited host', () => {
      const ingress: V1Ingress = {
        metadata: { name: 'pathless', namespace: 'default' },
        spec: {
          rules: [{ host: Host }, { host: OtherHost, http: { paths: [] } }],
        },
      }

      const rules = pruneIngressRules(ingress, [newProhibitedTargetFixture('prohibit-bye', Host)])

      expect(rules).toEqual([{ host: OtherHost, http: { paths: [] } }])
    })

    it('keep allowed paths without touching ingress', () => {
      const ingress = newIngressFixture()
      const [rule] = ingress.spec?.rules ?? []

      rule.http?.paths.push({
        path: '/fox',
        pathType: 'Prefix',
        backend: { service: { name: 'fox', port: { number: 80 } } },
      })

      const rules = pruneIngressRules(ingress, [newProhibitedTargetFixture('prohibit-fox', Host, ['/fox'])])

      expect(rules[0].http?.paths.map((path) => path.path)).toEqual(['/hi'])
      expect(rules[1].host).toBe(OtherHost)
      expect(rule.http?.paths).toHaveLength(2)
    })

    it('keep ingress path entries of surviving rules', () => {
      const ingress = newIngressFixture()
      const [rule, otherRule] = ingress.spec?.rules ?? []

      const rules = pruneIngressRules(ingress, [newProhibitedTargetFixture('prohibit-other', OtherHost, ['/nope'])])

      expect(rules[0].http?.paths[0]).toBe(rule.http?.paths[0])
      expect(rules[1].http?.paths[0]).toBe(otherRule.http?.paths[0])
    })

    it('return empty list for ingress without rules', () => {
      expect(
        pruneIngressRules({ metadata: { name: 'empty' }, spec: {} }, [newProhibitedTargetFixture('all')])
      ).toEqual([])
    })
  })
})
