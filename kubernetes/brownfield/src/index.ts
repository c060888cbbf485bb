export * from './existing-resources'
export * from './ingress'
export * from './target'
