export interface EnvVariables {
  subscriptionId: string
  resourceGroupName: string
  gatewayName: string
  watchNamespace?: string
  usePrivateIp: boolean
  enableBrownfieldDeployment: boolean
  enableIstioIntegration: boolean
  armEndpoint: string
  armAccessToken?: string
}

export const DefaultArmEndpoint = 'https://management.azure.com'

const isTrue = (value?: string): boolean => value?.trim().toLowerCase() === 'true'

export const loadEnvVariables = (env: NodeJS.ProcessEnv = process.env): EnvVariables => {
  const required = (key: string): string => {
    const value = env[key]

    if (!value) {
      throw new Error(`Environment variable ${key} is required`)
    }

    return value
  }

  return {
    subscriptionId: required('APPGW_SUBSCRIPTION_ID'),
    resourceGroupName: required('APPGW_RESOURCE_GROUP'),
    gatewayName: required('APPGW_NAME'),
    watchNamespace: env.WATCH_NAMESPACE || undefined,
    usePrivateIp: isTrue(env.USE_PRIVATE_IP),
    enableBrownfieldDeployment: isTrue(env.APPGW_ENABLE_BROWNFIELD_DEPLOYMENT),
    enableIstioIntegration: isTrue(env.APPGW_ENABLE_ISTIO_INTEGRATION),
    armEndpoint: (env.ARM_ENDPOINT || DefaultArmEndpoint).replace(/\/+$/, ''),
    armAccessToken: env.ARM_ACCESS_TOKEN || undefined,
  }
}
