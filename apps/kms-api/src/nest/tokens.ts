export const KMS_API_ROUTE_HANDLERS = Symbol('KMS_API_ROUTE_HANDLERS')
