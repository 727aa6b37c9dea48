export {
  createModuleClassLoader,
  isConstructible,
  type ClassLoader,
  type Constructible,
} from './class-loader.js';
export { instantiateSerDes, type InstantiatorDeps } from './instantiator.js';
