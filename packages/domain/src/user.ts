export interface User {
  id: string;
  loginId: string;
  credentialHash: string;
  displayName: string;
  createdAt: Date;
  updatedAt: Date;
}
