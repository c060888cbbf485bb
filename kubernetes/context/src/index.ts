export * from './ingress-class'
export * from './k8s-context'
export * from './k8s-context.errors'
export * from './resource.store'
