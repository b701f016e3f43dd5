import {Module, type DynamicModule} from '@nestjs/common'

import type {CreateKmsApiRouteHandlersInput} from '../http/requestHandler'
import {createKmsApiRouteHandlers} from '../http/requestHandler'
import {CreateKeyController} from './controllers/createKeyController'
import {CreateKeystoreController} from './controllers/createKeystoreController'
import {DecryptController} from './controllers/decryptController'
import {EncryptController} from './controllers/encryptController'
import {FallbackController} from './controllers/fallbackController'
import {HealthController} from './controllers/healthController'
import {SignController} from './controllers/signController'
import {VerifyController} from './controllers/verifyController'
import {KMS_API_ROUTE_HANDLERS} from './tokens'

export type KmsApiNestModuleOptions = CreateKmsApiRouteHandlersInput

// FallbackController must stay last.
@Module({
  controllers: [
    HealthController,
    CreateKeystoreController,
    CreateKeyController,
    SignController,
    VerifyController,
    EncryptController,
    DecryptController,
    FallbackController
  ]
})
export class KmsApiNestModule {
  public static register(options: KmsApiNestModuleOptions): DynamicModule {
    return {
      module: KmsApiNestModule,
      providers: [
        {
          provide: KMS_API_ROUTE_HANDLERS,
          useFactory: () => createKmsApiRouteHandlers(options)
        }
      ]
    }
  }
}
