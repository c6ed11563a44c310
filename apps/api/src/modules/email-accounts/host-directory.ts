import { ObjectId, type Filter } from 'mongodb';
import { z } from 'zod';

import { getCollection } from '../../config/mongo.js';
import type { Limitation } from './quota.service.js';

export interface CustomerDirectory {
  exists(customerId: string): Promise<boolean>;
}

export interface MembershipDirectory {
  getLimitation(membershipId: string, feature: string): Promise<Limitation | null>;
}

interface HostDocument {
  _id: ObjectId | string;
  limitations?: Record<string, unknown>;
}

const limitationSchema = z.object({
  enabled: z.boolean().default(false),
  limit: z.union([z.number().int().nonnegative(), z.boolean()]).default(0),
});

/** Host records may be keyed by ObjectId or by a plain string id. */
const byId = (id: string): Filter<HostDocument> =>
  ObjectId.isValid(id) ? { _id: { $in: [new ObjectId(id), id] } } : { _id: id };

/**
 * Reads the hosting platform's own `customers` collection.
 */
export class MongoCustomerDirectory implements CustomerDirectory {
  async exists(customerId: string): Promise<boolean> {
    const collection = await getCollection<HostDocument>('customers');
    return (await collection.countDocuments(byId(customerId), { limit: 1 })) > 0;
  }
}

/**
 * Reads `memberships.limitations.{feature}`; a malformed entry counts as absent.
 */
export class MongoMembershipDirectory implements MembershipDirectory {
  async getLimitation(membershipId: string, feature: string): Promise<Limitation | null> {
    const collection = await getCollection<HostDocument>('memberships');
    const membership = await collection.findOne(byId(membershipId), { projection: { limitations: 1 } });
    const parsed = limitationSchema.safeParse(membership?.limitations?.[feature]);
    return parsed.success ? parsed.data : null;
  }
}
