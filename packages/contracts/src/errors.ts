export type ApiErrorCode =
  | 'DuplicateUsername'
  | 'DuplicateEmail'
  | 'UsernameUnavailable'
  | 'InvalidBody'
  | 'InvalidAboutMe'
  | 'SelfFollow'
  | 'TokenInvalid'
  | 'IdentityNotFound'
  | 'StorageUnavailable'
  | 'ValidationError'
  | 'Unauthorized'
  | 'NotFound'
  | 'InternalError';

export interface ApiError {
  error: ApiErrorCode;
  message: string;
  details?: unknown;
}
