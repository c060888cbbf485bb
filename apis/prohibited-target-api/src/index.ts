export * from './prohibited-target.interfaces'
export * from './prohibited-target.types'
