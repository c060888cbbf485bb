export * from './fake-event.recorder'
export * from './fixtures.constants'
export * from './gateway.fixtures'
export * from './istio.fixtures'
export * from './kubernetes.fixtures'
