export { Value } from './value.js'
export {
  formatReal,
  realToInteger,
  textToInteger,
  textToReal,
} from './coerce.js'
