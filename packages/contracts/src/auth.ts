export interface User {
  id: number;
  username: string;
  aboutMe: string | null;
  /** ISO-8601 */
  lastSeen: string;
  avatar: string;
}

/** The signed-in identity, which also sees its own email */
export interface CurrentUser extends User {
  email: string;
}

export interface RegisterRequest {
  username: string;
  email: string;
  password: string;
  password2: string;
}

export interface RegisterResponse {
  user: CurrentUser;
}

export interface LoginRequest {
  username: string;
  password: string;
  rememberMe?: boolean;
}

export interface LoginResponse {
  user: CurrentUser;
  accessToken: string;
  expiresIn: number;
}

export interface ForgotPasswordRequest {
  email: string;
}

export interface ResetPasswordWithTokenRequest {
  password: string;
  password2: string;
}

export interface VerifyResetTokenResponse {
  valid: boolean;
}

export interface MessageResponse {
  message: string;
}
