import type { EmailAccountStatus, PurchaseType } from '@mailhost/common';
import { MongoServerError, ObjectId, type Filter } from 'mongodb';

import { getCollection } from '../../config/mongo.js';
import type { EmailAccount } from './email-account.js';
import {
  DuplicateEmailAddressError,
  statusList,
  type EmailAccountFilter,
  type EmailAccountRepository,
  type NewEmailAccount,
} from './email-account.repository.js';

interface EmailAccountDocument {
  _id: ObjectId;
  emailAddress: string;
  domain: string;
  customerId: string;
  membershipId: string | null;
  siteId: string | null;
  provider: string;
  externalId: string | null;
  quotaMb: number;
  purchaseType: PurchaseType;
  paymentId: string | null;
  status: EmailAccountStatus;
  passwordDisplayToken: string | null;
  dateCreated: Date;
  dateModified: Date;
}

const COLLECTION = 'emailAccounts';
const DUPLICATE_KEY = 11000;

const toQuery = (filter: EmailAccountFilter): Filter<EmailAccountDocument> => {
  const statuses = statusList(filter.status);
  return {
    ...(filter.customerId !== undefined ? { customerId: filter.customerId } : {}),
    ...(filter.membershipId !== undefined ? { membershipId: filter.membershipId } : {}),
    ...(filter.siteId !== undefined ? { siteId: filter.siteId } : {}),
    ...(filter.provider !== undefined ? { provider: filter.provider } : {}),
    ...(statuses !== undefined ? { status: { $in: [...statuses] } } : {}),
  };
};

export class MongoEmailAccountRepository implements EmailAccountRepository {
  private indexCreationPromise: Promise<void> | null = null;

  private async ensureIndexes() {
    if (this.indexCreationPromise) {
      return this.indexCreationPromise;
    }

    this.indexCreationPromise = (async () => {
      const collection = await getCollection<EmailAccountDocument>(COLLECTION);
      await collection.createIndex({ emailAddress: 1 }, { unique: true });
      await collection.createIndex({ customerId: 1, membershipId: 1 });
      await collection.createIndex({ membershipId: 1 });
      await collection.createIndex({ status: 1 });
    })();

    return this.indexCreationPromise;
  }

  private async getCollection() {
    await this.ensureIndexes();
    return getCollection<EmailAccountDocument>(COLLECTION);
  }

  async create(input: NewEmailAccount): Promise<EmailAccount> {
    const collection = await this.getCollection();
    const now = new Date();

    const doc: EmailAccountDocument = {
      ...input,
      _id: new ObjectId(),
      emailAddress: input.emailAddress.toLowerCase(),
      dateCreated: now,
      dateModified: now,
    };

    try {
      await collection.insertOne(doc);
    } catch (error) {
      if (error instanceof MongoServerError && error.code === DUPLICATE_KEY) {
        throw new DuplicateEmailAddressError(doc.emailAddress);
      }
      throw error;
    }
    return this.toEmailAccount(doc);
  }

  async findById(id: string): Promise<EmailAccount | null> {
    if (!ObjectId.isValid(id)) {
      return null;
    }
    const collection = await this.getCollection();
    const doc = await collection.findOne({ _id: new ObjectId(id) });
    return doc ? this.toEmailAccount(doc) : null;
  }

  async findByEmailAddress(emailAddress: string): Promise<EmailAccount | null> {
    const collection = await this.getCollection();
    const doc = await collection.findOne({ emailAddress: emailAddress.toLowerCase() });
    return doc ? this.toEmailAccount(doc) : null;
  }

  async list(filter: EmailAccountFilter = {}): Promise<EmailAccount[]> {
    const collection = await this.getCollection();
    const docs = await collection.find(toQuery(filter)).sort({ dateCreated: 1 }).toArray();
    return docs.map((doc) => this.toEmailAccount(doc));
  }

  async count(filter: EmailAccountFilter = {}): Promise<number> {
    const collection = await this.getCollection();
    return collection.countDocuments(toQuery(filter));
  }

  async save(account: EmailAccount): Promise<EmailAccount | null> {
    if (!ObjectId.isValid(account.id)) {
      return null;
    }
    const collection = await this.getCollection();
    const { id, dateCreated: _dateCreated, ...fields } = account;

    const doc = await collection.findOneAndUpdate(
      { _id: new ObjectId(id) },
      { $set: { ...fields, dateModified: new Date() } },
      { returnDocument: 'after' },
    );
    return doc ? this.toEmailAccount(doc) : null;
  }

  async delete(id: string): Promise<boolean> {
    if (!ObjectId.isValid(id)) {
      return false;
    }
    const collection = await this.getCollection();
    const result = await collection.deleteOne({ _id: new ObjectId(id) });
    return result.deletedCount > 0;
  }

  private toEmailAccount(doc: EmailAccountDocument): EmailAccount {
    return {
      id: doc._id.toHexString(),
      emailAddress: doc.emailAddress,
      domain: doc.domain,
      customerId: doc.customerId,
      membershipId: doc.membershipId,
      siteId: doc.siteId,
      provider: doc.provider,
      externalId: doc.externalId,
      quotaMb: doc.quotaMb,
      purchaseType: doc.purchaseType,
      paymentId: doc.paymentId,
      status: doc.status,
      passwordDisplayToken: doc.passwordDisplayToken,
      dateCreated: doc.dateCreated,
      dateModified: doc.dateModified,
    };
  }
}
