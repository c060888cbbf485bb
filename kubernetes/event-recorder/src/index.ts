export * from './event-recorder.interfaces'
export * from './event-recorder.reasons'
export * from './kubernetes.event-recorder'
