export * from './virtual-service.interfaces'
export * from './virtual-service.types'
