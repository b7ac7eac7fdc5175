import { type MemberRole } from './enums';

export interface FamilyGroup {
  id: string;
  name: string;
  createdAt: Date;
}

export interface Membership {
  userId: string;
  groupId: string;
  role: MemberRole;
  joinedAt: Date;
}
