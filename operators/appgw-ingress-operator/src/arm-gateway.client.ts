import Axios                            from 'axios'
import { AxiosInstance }                from 'axios'
import { RawAxiosRequestHeaders }       from 'axios'

import { ApplicationGateway }           from '@appgw-ingress/gateway-api'
import { ApplicationGatewayIdentifier } from '@appgw-ingress/gateway-api'
import { Logger }                       from '@appgw-ingress/logger'

import { GatewayClient }                from './gateway-client.interfaces'

export const ApplicationGatewayApiVersion = '2018-12-01'

export interface ArmGatewayClientOptions {
  armEndpoint: string
  accessToken?: string
  axios?: AxiosInstance
}

export class ArmGatewayClient implements GatewayClient {
  private readonly logger = new Logger(ArmGatewayClient.name)

  private readonly axios: AxiosInstance

  private readonly url: string

  private readonly headers: RawAxiosRequestHeaders

  constructor(
    private readonly identifier: ApplicationGatewayIdentifier,
    options: ArmGatewayClientOptions
  ) {
    this.axios = options.axios ?? Axios.create()
    this.url = `${options.armEndpoint}${identifier.gatewayId()}?api-version=${ApplicationGatewayApiVersion}`
    this.headers = options.accessToken ? { Authorization: `Bearer ${options.accessToken}` } : {}
  }

  async get(): Promise<ApplicationGateway> {
    try {
      const { data } = await this.axios.get<ApplicationGateway>(this.url, { headers: this.headers })

      return data
    } catch (error) {
      this.logger.error(`Unable to get application gateway ${this.identifier.gatewayName}`, {
        err: this.describe(error),
      })

      throw new Error(`unable to get application gateway ${this.identifier.gatewayName}`)
    }
  }

  async update(gateway: ApplicationGateway): Promise<ApplicationGateway> {
    try {
      const { data } = await this.axios.put<ApplicationGateway>(this.url, gateway, {
        headers: this.headers,
      })

      return data
    } catch (error) {
      this.logger.error(`Unable to update application gateway ${this.identifier.gatewayName}`, {
        err: this.describe(error),
      })

      throw new Error(`unable to update application gateway ${this.identifier.gatewayName}`)
    }
  }

  private describe(error: unknown): unknown {
    if (Axios.isAxiosError(error)) {
      return {
        message: error.message,
        status: error.response?.status,
        body: error.response?.data,
      }
    }

    return error
  }
}
