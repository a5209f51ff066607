import mongoose from 'mongoose'
import { AccountPool, DispatchLog, PoolMembership, SocialAccount, StatusLog } from '../models'
import type {
  AccountPoolRecord,
  DispatchLogEntry,
  Platform,
  PoolMembershipRecord,
  SocialAccountRecord,
  StatusLogEntry,
} from '../types/rotation'
import { ConflictError } from '../utils/errors'
import type {
  AccountFilter,
  AccountPoolPatch,
  AccountRepository,
  AppendOnlyLog,
  LogQuery,
  MembershipRepository,
  NewAccountPool,
  NewPoolMembership,
  NewSocialAccount,
  PoolFilter,
  PoolMembershipPatch,
  PoolRepository,
  RotationStore,
  SocialAccountPatch,
} from './types'

type ObjectId = mongoose.Types.ObjectId

// Lean document shapes as returned by .lean()
interface LeanAccount extends Omit<SocialAccountRecord, 'id'> {
  _id: ObjectId
}
interface LeanPool extends Omit<AccountPoolRecord, 'id'> {
  _id: ObjectId
}
interface LeanMembership extends Omit<PoolMembershipRecord, 'id' | 'poolId' | 'accountId'> {
  _id: ObjectId
  poolId: ObjectId
  accountId: ObjectId
}
interface LeanDispatchLog extends Omit<DispatchLogEntry, 'poolId' | 'membershipId' | 'accountId'> {
  poolId: ObjectId
  membershipId: ObjectId
  accountId: ObjectId
}
interface LeanStatusLog extends Omit<StatusLogEntry, 'poolId' | 'membershipId' | 'accountId'> {
  poolId?: ObjectId
  membershipId?: ObjectId
  accountId?: ObjectId
}

const DUPLICATE_KEY = 11000

const isDuplicateKeyError = (error: unknown): boolean =>
  error instanceof mongoose.mongo.MongoServerError && error.code === DUPLICATE_KEY

const isId = (id: string) => mongoose.isValidObjectId(id)

const toAccount = ({ _id, ...rest }: LeanAccount): SocialAccountRecord => ({ ...rest, id: _id.toString() })

const toPool = ({ _id, ...rest }: LeanPool): AccountPoolRecord => ({ ...rest, id: _id.toString() })

const toMembership = ({ _id, poolId, accountId, ...rest }: LeanMembership): PoolMembershipRecord => ({
  ...rest,
  id: _id.toString(),
  poolId: poolId.toString(),
  accountId: accountId.toString(),
})

class MongoAccountRepository implements AccountRepository {
  async create(input: NewSocialAccount): Promise<SocialAccountRecord> {
    const doc = await SocialAccount.create(input)
    return toAccount(doc.toObject<LeanAccount>())
  }

  async findById(id: string): Promise<SocialAccountRecord | null> {
    if (!isId(id)) return null
    const doc = await SocialAccount.findById(id).lean<LeanAccount>().exec()
    return doc ? toAccount(doc) : null
  }

  async findByIds(ids: string[]): Promise<SocialAccountRecord[]> {
    const docs = await SocialAccount.find({ _id: { $in: ids.filter(isId) } })
      .lean<LeanAccount[]>()
      .exec()
    return docs.map(toAccount)
  }

  async list(filter: AccountFilter): Promise<SocialAccountRecord[]> {
    const docs = await SocialAccount.find({ ...filter })
      .sort({ createdAt: 1 })
      .lean<LeanAccount[]>()
      .exec()
    return docs.map(toAccount)
  }

  async compareAndSwap(
    id: string,
    expectedVersion: number,
    patch: SocialAccountPatch,
  ): Promise<SocialAccountRecord | null> {
    if (!isId(id)) return null
    const doc = await SocialAccount.findOneAndUpdate(
      { _id: id, version: expectedVersion },
      { $set: patch, $inc: { version: 1 } },
      { new: true },
    )
      .lean<LeanAccount>()
      .exec()
    return doc ? toAccount(doc) : null
  }

  async resetDailyCounters(): Promise<number> {
    const result = await SocialAccount.updateMany(
      { postsToday: { $ne: 0 } },
      { $set: { postsToday: 0 }, $inc: { version: 1 } },
    ).exec()
    return result.modifiedCount
  }
}

class MongoPoolRepository implements PoolRepository {
  async create(input: NewAccountPool): Promise<AccountPoolRecord> {
    try {
      const doc = await AccountPool.create(input)
      return toPool(doc.toObject<LeanPool>())
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw new ConflictError('Pool with this name already exists for this brand and platform')
      }
      throw error
    }
  }

  async findById(id: string): Promise<AccountPoolRecord | null> {
    if (!isId(id)) return null
    const doc = await AccountPool.findById(id).lean<LeanPool>().exec()
    return doc ? toPool(doc) : null
  }

  async findActive(brandId: string, platform: Platform): Promise<AccountPoolRecord | null> {
    const doc = await AccountPool.findOne({ brandId, platform, isActive: true })
      .sort({ createdAt: 1 })
      .lean<LeanPool>()
      .exec()
    return doc ? toPool(doc) : null
  }

  async list(filter: PoolFilter): Promise<AccountPoolRecord[]> {
    const docs = await AccountPool.find({ ...filter })
      .sort({ createdAt: 1 })
      .lean<LeanPool[]>()
      .exec()
    return docs.map(toPool)
  }

  async update(id: string, patch: AccountPoolPatch): Promise<AccountPoolRecord | null> {
    if (!isId(id)) return null
    try {
      const doc = await AccountPool.findByIdAndUpdate(id, { $set: patch }, { new: true, runValidators: true })
        .lean<LeanPool>()
        .exec()
      return doc ? toPool(doc) : null
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw new ConflictError('Pool with this name already exists for this brand and platform')
      }
      throw error
    }
  }
}

class MongoMembershipRepository implements MembershipRepository {
  async create(input: NewPoolMembership): Promise<PoolMembershipRecord> {
    try {
      const doc = await PoolMembership.create(input)
      return toMembership(doc.toObject<LeanMembership>())
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw new ConflictError('Account already in this pool')
      }
      throw error
    }
  }

  async findById(id: string): Promise<PoolMembershipRecord | null> {
    if (!isId(id)) return null
    const doc = await PoolMembership.findById(id).lean<LeanMembership>().exec()
    return doc ? toMembership(doc) : null
  }

  async findByPool(poolId: string): Promise<PoolMembershipRecord[]> {
    if (!isId(poolId)) return []
    const docs = await PoolMembership.find({ poolId })
      .sort({ createdAt: 1 })
      .lean<LeanMembership[]>()
      .exec()
    return docs.map(toMembership)
  }

  async findByPoolAndAccount(poolId: string, accountId: string): Promise<PoolMembershipRecord | null> {
    if (!isId(poolId) || !isId(accountId)) return null
    const doc = await PoolMembership.findOne({ poolId, accountId }).lean<LeanMembership>().exec()
    return doc ? toMembership(doc) : null
  }

  async maxPriority(poolId: string): Promise<number | null> {
    if (!isId(poolId)) return null
    const doc = await PoolMembership.findOne({ poolId })
      .sort({ priority: -1 })
      .select('priority')
      .lean<{ priority: number }>()
      .exec()
    return doc ? doc.priority : null
  }

  async compareAndSwap(
    id: string,
    expectedVersion: number,
    patch: PoolMembershipPatch,
  ): Promise<PoolMembershipRecord | null> {
    if (!isId(id)) return null
    const doc = await PoolMembership.findOneAndUpdate(
      { _id: id, version: expectedVersion },
      { $set: patch, $inc: { version: 1 } },
      { new: true },
    )
      .lean<LeanMembership>()
      .exec()
    return doc ? toMembership(doc) : null
  }

  async delete(id: string): Promise<boolean> {
    if (!isId(id)) return false
    const result = await PoolMembership.deleteOne({ _id: id }).exec()
    return result.deletedCount > 0
  }

  async resetDailyCounters(): Promise<number> {
    const result = await PoolMembership.updateMany(
      { postsToday: { $ne: 0 } },
      { $set: { postsToday: 0 }, $inc: { version: 1 } },
    ).exec()
    return result.modifiedCount
  }

  async findReservedBefore(cutoff: Date): Promise<PoolMembershipRecord[]> {
    const docs = await PoolMembership.find({ reservedAt: { $ne: null, $lt: cutoff } })
      .lean<LeanMembership[]>()
      .exec()
    return docs.map(toMembership)
  }

  async findExpiredCooldowns(now: Date): Promise<PoolMembershipRecord[]> {
    const docs = await PoolMembership.find({
      status: 'cooldown',
      $or: [{ cooldownUntil: null }, { cooldownUntil: { $lte: now } }],
    })
      .lean<LeanMembership[]>()
      .exec()
    return docs.map(toMembership)
  }
}

const toDispatchEntry = (doc: LeanDispatchLog): DispatchLogEntry => ({
  poolId: doc.poolId.toString(),
  membershipId: doc.membershipId.toString(),
  accountId: doc.accountId.toString(),
  brandId: doc.brandId,
  platform: doc.platform,
  attempt: doc.attempt,
  success: doc.success,
  errorKind: doc.errorKind,
  errorMessage: doc.errorMessage,
  postId: doc.postId,
  latencyMs: doc.latencyMs,
  createdAt: doc.createdAt,
})

class MongoDispatchLog implements AppendOnlyLog<DispatchLogEntry> {
  async append(entry: DispatchLogEntry): Promise<void> {
    await DispatchLog.create(entry)
  }

  async listByPool(poolId: string, query: LogQuery): Promise<DispatchLogEntry[]> {
    if (!isId(poolId)) return []
    const filter = query.since ? { poolId, createdAt: { $gte: query.since } } : { poolId }
    const docs = await DispatchLog.find(filter)
      .sort({ createdAt: -1 })
      .limit(query.limit)
      .lean<LeanDispatchLog[]>()
      .exec()
    return docs.map(toDispatchEntry)
  }

  async listSince(since: Date): Promise<DispatchLogEntry[]> {
    const docs = await DispatchLog.find({ createdAt: { $gte: since } })
      .sort({ createdAt: -1 })
      .lean<LeanDispatchLog[]>()
      .exec()
    return docs.map(toDispatchEntry)
  }
}

const toStatusEntry = (doc: LeanStatusLog): StatusLogEntry => ({
  poolId: doc.poolId?.toString(),
  membershipId: doc.membershipId?.toString(),
  accountId: doc.accountId?.toString(),
  event: doc.event,
  oldStatus: doc.oldStatus,
  newStatus: doc.newStatus,
  message: doc.message,
  triggeredBy: doc.triggeredBy,
  createdAt: doc.createdAt,
})

class MongoStatusLog implements AppendOnlyLog<StatusLogEntry> {
  async append(entry: StatusLogEntry): Promise<void> {
    await StatusLog.create(entry)
  }

  async listByPool(poolId: string, query: LogQuery): Promise<StatusLogEntry[]> {
    if (!isId(poolId)) return []
    const filter = query.since ? { poolId, createdAt: { $gte: query.since } } : { poolId }
    const docs = await StatusLog.find(filter)
      .sort({ createdAt: -1 })
      .limit(query.limit)
      .lean<LeanStatusLog[]>()
      .exec()
    return docs.map(toStatusEntry)
  }

  async listSince(since: Date): Promise<StatusLogEntry[]> {
    const docs = await StatusLog.find({ createdAt: { $gte: since } })
      .sort({ createdAt: -1 })
      .lean<LeanStatusLog[]>()
      .exec()
    return docs.map(toStatusEntry)
  }
}

export const createMongoStore = (): RotationStore => ({
  accounts: new MongoAccountRepository(),
  pools: new MongoPoolRepository(),
  memberships: new MongoMembershipRepository(),
  dispatchLogs: new MongoDispatchLog(),
  statusLogs: new MongoStatusLog(),
})
