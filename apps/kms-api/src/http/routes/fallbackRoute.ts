import {badRequest} from '../../errors'
import type {KmsApiRouteLogicHandler} from './types'

export const handleFallbackRoute: KmsApiRouteLogicHandler = ({method, pathname}) => {
  throw badRequest('route_not_found', `unsupported route ${method} ${pathname}`)
}
