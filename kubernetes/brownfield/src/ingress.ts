import { V1Ingress }                from '@kubernetes/client-node'
import { V1IngressRule }            from '@kubernetes/client-node'

import { ProhibitedTargetResource } from '@appgw-ingress/k8s-prohibited-target-api'

import { Target }                   from './target'
import { getTargetBlacklist }       from './target'

/**
 * Returns the rules of the ingress without the (host, path) targets the
 * controller must not create configuration for. The ingress is left untouched
 * and the surviving path entries are the ingress's own objects.
 */
export const pruneIngressRules = (
  ingress: V1Ingress,
  prohibitedTargets: Array<ProhibitedTargetResource>
): Array<V1IngressRule> => {
  const rules = ingress.spec?.rules ?? []

  if (rules.length === 0) {
    return [...rules]
  }

  const blacklist = getTargetBlacklist(prohibitedTargets)

  if (blacklist.isEmpty) {
    return [...rules]
  }

  return rules.reduce<Array<V1IngressRule>>((result, rule) => {
    const paths = rule.http?.paths ?? []

    if (paths.length === 0) {
      return new Target(rule.host).isBlacklisted(blacklist) ? result : [...result, rule]
    }

    const allowed = paths.filter((path) => !new Target(rule.host, path.path).isBlacklisted(blacklist))

    if (allowed.length === 0) {
      return result
    }

    return [
      ...result,
      {
        ...rule,
        http: {
          ...rule.http,
          paths: allowed,
        },
      },
    ]
  }, [])
}
