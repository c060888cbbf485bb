/* eslint-disable no-shadow */

export enum BuildStage {
  HealthProbes = 'health probes',
  BackendHttpSettings = 'backend http settings',
  BackendAddressPools = 'backend address pools',
  FrontendListeners = 'frontend listeners',
  RequestRoutingRules = 'request routing rules',
}
