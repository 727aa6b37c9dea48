export { KeyedLock } from './lock.js';
export {
  registerOrReuse,
  registerPrepared,
  prepareCandidate,
  requireProvider,
  fingerprintSchema,
  type RegistrationDeps,
  type RegistrationResult,
  type PreparedCandidate,
} from './register.js';
