export * from './gateway.identifier'
export * from './gateway.interfaces'
export * from './gateway.types'
