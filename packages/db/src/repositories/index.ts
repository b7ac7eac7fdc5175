import { type Repositories } from '@homestock/domain';
import { type Queryable } from '../client';
import { PgUserRepository } from './user-repository';
import { PgGroupRepository } from './group-repository';
import { PgMembershipRepository } from './membership-repository';
import { PgCategoryRepository } from './category-repository';
import { PgReferenceItemRepository } from './reference-item-repository';
import { PgMarketListingRepository } from './market-listing-repository';
import { PgItemRepository } from './item-repository';
import { PgItemImageRepository } from './item-image-repository';
import { PgThreadRepository } from './thread-repository';
import { PgMessageRepository } from './message-repository';
import { PgReactionRepository } from './reaction-repository';
import { PgAttachmentRepository } from './attachment-repository';
import { PgRelationStore } from './relation-store';

export function createPgRepositories(): Repositories<Queryable> {
  return {
    users: new PgUserRepository(),
    groups: new PgGroupRepository(),
    memberships: new PgMembershipRepository(),
    categories: new PgCategoryRepository(),
    referenceItems: new PgReferenceItemRepository(),
    listings: new PgMarketListingRepository(),
    items: new PgItemRepository(),
    itemImages: new PgItemImageRepository(),
    threads: new PgThreadRepository(),
    messages: new PgMessageRepository(),
    reactions: new PgReactionRepository(),
    attachments: new PgAttachmentRepository(),
    relations: new PgRelationStore(),
  };
}

export {
  PgUserRepository,
  PgGroupRepository,
  PgMembershipRepository,
  PgCategoryRepository,
  PgReferenceItemRepository,
  PgMarketListingRepository,
  PgItemRepository,
  PgItemImageRepository,
  PgThreadRepository,
  PgMessageRepository,
  PgReactionRepository,
  PgAttachmentRepository,
  PgRelationStore,
};
