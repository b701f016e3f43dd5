import {sendJson} from '../../http'
import type {KmsApiRouteLogicHandler} from './types'

export const handleHealthRoute: KmsApiRouteLogicHandler = ({response, correlationId, runtime}) => {
  sendJson({
    response,
    status: 200,
    correlationId,
    payload: {status: 'ok'},
    logger: runtime.logger
  })
}
