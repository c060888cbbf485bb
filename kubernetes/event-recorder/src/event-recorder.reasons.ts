/* eslint-disable no-shadow */

export enum EventReason {
  ServiceNotFound = 'ServiceNotFound',
  PortResolutionError = 'PortResolutionError',
  BackendPortTargetMatch = 'BackendPortTargetMatch',
  InvalidIngress = 'InvalidIngress',
  InvalidConfiguration = 'InvalidConfiguration',
  ConfigurationApplied = 'ConfigurationApplied',
}
