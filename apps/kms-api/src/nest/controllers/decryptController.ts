import {Controller, Inject, Post, Req, Res} from '@nestjs/common'
import type {Request, Response} from 'express'

import type {KmsApiRouteHandlers} from '../../http/routes/types'
import {KMS_API_ROUTE_HANDLERS} from '../tokens'

@Controller()
export class DecryptController {
  public constructor(@Inject(KMS_API_ROUTE_HANDLERS) private readonly routeHandlers: KmsApiRouteHandlers) {}

  @Post('/kms/keystores/:keystoreId/keys/:keyId/decrypt')
  public async handle(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.routeHandlers.decrypt(request, response)
  }
}
