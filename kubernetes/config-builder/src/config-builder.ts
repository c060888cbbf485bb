import { ApplicationGateway }                 from '@appgw-ingress/gateway-api'
import { ApplicationGatewayIdentifier }       from '@appgw-ingress/gateway-api'
import { ApplicationGatewayPropertiesFormat } from '@appgw-ingress/gateway-api'
import { ExistingResources }                  from '@appgw-ingress/k8s-brownfield'
import { K8sContext }                         from '@appgw-ingress/k8s-context'
import { EventRecorder }                      from '@appgw-ingress/k8s-event-recorder'
import { Logger }                             from '@appgw-ingress/logger'

import { ConfigBuilderContext }               from './config-builder.interfaces'
import { ConfigBuilderOptions }               from './config-builder.interfaces'
import { StageContext }                       from './config-builder.interfaces'
import { Validator }                          from './config-builder.interfaces'
import { BuildInfo }                          from './version'
import { BuildStage }                         from './config-builder.enums'
import { ConfigBuilderError }                 from './config-builder.errors'
import { addTags }                            from './tags'
import { defaultPostBuildValidators }         from './validators'
import { defaultPreBuildValidators }          from './validators'
import { generateBackendAddressPools }        from './backend-address-pools'
import { generateBackendHttpSettings }        from './backend-http-settings'
import { generateFrontendListeners }          from './frontend-listeners'
import { generateHealthProbes }               from './health-probes'
import { generateRequestRoutingRules }        from './request-routing-rules'
import { getBuildInfo }                       from './version'

export class ConfigBuilder {
  private readonly logger = new Logger(ConfigBuilder.name)

  private readonly buildInfo: BuildInfo

  private readonly preBuildValidators: Array<Validator>

  private readonly postBuildValidators: Array<Validator>

  constructor(
    private readonly k8sContext: K8sContext,
    private readonly gatewayIdentifier: ApplicationGatewayIdentifier,
    private readonly original: ApplicationGateway,
    private readonly recorder: EventRecorder,
    options: ConfigBuilderOptions = {}
  ) {
    this.buildInfo = options.buildInfo ?? getBuildInfo()
    this.preBuildValidators = options.preBuildValidators ?? defaultPreBuildValidators
    this.postBuildValidators = options.postBuildValidators ?? defaultPostBuildValidators
  }

  build(cbCtx: ConfigBuilderContext): ApplicationGateway {
    const gateway: ApplicationGateway = structuredClone(this.original)
    const stage: StageContext = {
      k8sContext: this.k8sContext,
      gatewayIdentifier: this.gatewayIdentifier,
      recorder: this.recorder,
      existing: cbCtx.envVariables.enableBrownfieldDeployment
        ? new ExistingResources(structuredClone(this.original), cbCtx.prohibitedTargets)
        : undefined,
    }

    const probes = this.runStage(BuildStage.HealthProbes, () => generateHealthProbes(stage, gateway, cbCtx))

    const settings = this.runStage(BuildStage.BackendHttpSettings, () =>
      generateBackendHttpSettings(stage, gateway, cbCtx, probes))

    const pools = this.runStage(BuildStage.BackendAddressPools, () =>
      generateBackendAddressPools(stage, gateway, settings))

    const listeners = this.runStage(BuildStage.FrontendListeners, () =>
      generateFrontendListeners(stage, gateway, cbCtx))

    this.runStage(BuildStage.RequestRoutingRules, () =>
      generateRequestRoutingRules(stage, gateway, cbCtx, settings, pools, listeners))

    addTags(gateway, this.buildInfo)

    return gateway
  }

  preBuildValidate(cbCtx: ConfigBuilderContext) {
    this.validate(this.preBuildValidators, cbCtx, this.original.properties)
  }

  postBuildValidate(cbCtx: ConfigBuilderContext, gateway: ApplicationGateway) {
    this.validate(this.postBuildValidators, cbCtx, gateway.properties)
  }

  private validate(
    validators: Array<Validator>,
    cbCtx: ConfigBuilderContext,
    properties: ApplicationGatewayPropertiesFormat
  ) {
    for (const validator of validators) {
      this.logger.debug(`Running ${validator.name} validator`)

      validator.validate({
        recorder: this.recorder,
        properties,
        envVariables: cbCtx.envVariables,
        ingressList: cbCtx.ingressList,
        serviceList: cbCtx.serviceList,
      })
    }
  }

  private runStage<T>(stage: BuildStage, generate: () => T): T {
    this.logger.debug(`Generating ${stage}`)

    try {
      return generate()
    } catch (error) {
      this.logger.error(`Unable to generate ${stage}`, { err: error })

      throw new ConfigBuilderError(stage)
    }
  }
}
