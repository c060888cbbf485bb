import { GatewayIngressOperator } from '@appgw-ingress/k8s-appgw-ingress-operator'
import { formatBuildInfo }        from '@appgw-ingress/k8s-config-builder'
import { getBuildInfo }           from '@appgw-ingress/k8s-config-builder'
import { loadEnvVariables }       from '@appgw-ingress/k8s-config-builder'
import { Logger }                 from '@appgw-ingress/logger'

const logger = new Logger('appgw-ingress')

const bootstrap = async () => {
  const envVariables = loadEnvVariables()
  const buildInfo = getBuildInfo()

  logger.info(`Starting application gateway ingress operator ${formatBuildInfo(buildInfo)}`, {
    gatewayName: envVariables.gatewayName,
    watchNamespace: envVariables.watchNamespace ?? 'all',
    brownfield: envVariables.enableBrownfieldDeployment,
    istio: envVariables.enableIstioIntegration,
  })

  const operator = new GatewayIngressOperator({ envVariables, buildInfo })

  const exit = (reason: string) => {
    logger.info(`Stopping on ${reason}`)

    operator.stop()

    process.exit(0)
  }

  process.on('SIGTERM', () => exit('SIGTERM')).on('SIGINT', () => exit('SIGINT'))

  await operator.start()
}

bootstrap().catch((error) => {
  logger.error('Operator failed', { err: error })
  process.exit(1)
})
