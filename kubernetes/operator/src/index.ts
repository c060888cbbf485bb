export * from './operator'
export * from './operator.enums'
export * from './operator.interfaces'
export * from './resource-meta.impl'
export * from './resource.utils'
