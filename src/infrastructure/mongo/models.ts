import { Schema, Types } from 'mongoose';
import type { Connection, Model } from 'mongoose';

export interface BucketDoc {
  _id: Types.ObjectId;
  bucket_id: string;
  name: string | null;
  type: string;
  client: string;
  hostname: string;
  created: Date;
}

export interface EventDoc {
  _id: Types.ObjectId;
  bucket: Types.ObjectId;
  timestamp: Date;
  duration: number;
  data: Record<string, unknown>;
}

export interface UserDoc {
  _id: Types.ObjectId;
  device_id: string;
  name: string;
  email: string;
  access_token: string;
  refresh_token: string;
  last_used_at: Date | null;
}

export interface ReportDoc {
  _id: Types.ObjectId;
  email: string;
  spent_time: number;
  call_time: number;
  date: Date;
  wfh: boolean;
}

const BucketSchema = new Schema<BucketDoc>(
  {
    bucket_id: { type: String, required: true, unique: true },
    name: { type: String, default: null },
    type: { type: String, required: true },
    client: { type: String, required: true },
    hostname: { type: String, required: true },
    created: { type: Date, required: true },
  },
  { collection: 'buckets', timestamps: false },
);

const EventSchema = new Schema<EventDoc>(
  {
    bucket: { type: Schema.Types.ObjectId, required: true, index: true },
    timestamp: { type: Date, required: true },
    duration: { type: Number, required: true, min: 0 },
    data: { type: Schema.Types.Mixed, default: {} },
  },
  { collection: 'events', timestamps: false, minimize: false },
);

// Range queries and "last event" scan per bucket, newest first
EventSchema.index({ bucket: 1, timestamp: -1 });

const UserSchema = new Schema<UserDoc>(
  {
    device_id: { type: String, required: true },
    name: { type: String, required: true },
    email: { type: String, required: true, unique: true },
    access_token: { type: String, required: true },
    refresh_token: { type: String, required: true },
    last_used_at: { type: Date, default: null, index: true },
  },
  { collection: 'users', timestamps: false },
);

const ReportSchema = new Schema<ReportDoc>(
  {
    email: { type: String, required: true },
    spent_time: { type: Number, required: true },
    call_time: { type: Number, required: true },
    date: { type: Date, required: true },
    wfh: { type: Boolean, required: true },
  },
  { collection: 'reports', timestamps: false },
);

ReportSchema.index({ email: 1, date: -1 });

export interface MongoModels {
  Bucket: Model<BucketDoc>;
  Event: Model<EventDoc>;
  User: Model<UserDoc>;
  Report: Model<ReportDoc>;
}

/**
 * Binds the models to one connection rather than mongoose's global
 * default, so several engines can coexist in a process.
 */
export function createModels(connection: Connection): MongoModels {
  return {
    Bucket: connection.model<BucketDoc>('Bucket', BucketSchema),
    Event: connection.model<EventDoc>('Event', EventSchema),
    User: connection.model<UserDoc>('User', UserSchema),
    Report: connection.model<ReportDoc>('Report', ReportSchema),
  };
}
