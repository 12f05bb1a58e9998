export interface UserProfile {
  userId: string;
  phone: string;
  email: string;
  verified: boolean;
  displayName: string;
  company: string;
}

export interface ProfileUpdate {
  displayName?: string;
  email?: string;
  company?: string;
}

export interface AuthToken {
  accessToken: string;
  tokenType: string;
}
