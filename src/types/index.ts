export {
  isRequestClass,
  Request,
  type RequestClass,
  requestTypeName,
  type ResponseOf,
} from './request.js';
export { Unit, unit } from './unit.js';
