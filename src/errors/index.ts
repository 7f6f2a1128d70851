export { AppError } from './AppError';
export { ProviderError, DataIntegrityError, JobCancelledError, errorMessage } from './domainErrors';
export type { ProviderErrorKind, ProviderErrorOptions } from './domainErrors';
export { RepositoryError } from './RepositoryError';
