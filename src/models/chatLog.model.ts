// src/models/chatLog.model.ts

import { Schema, type Connection, type Model } from 'mongoose';
import { ROLES, type Role } from './chat.model';

export interface StoredMessage {
    role: Role;
    content: string;
    timestamp: Date;
}

export interface ChatLogDocument {
    session_id: string;
    messages: StoredMessage[];
    created_at: Date;
    updated_at: Date;
    metadata?: Record<string, unknown>;
}

export const CHAT_LOG_COLLECTION = 'chat_logs';

const MessageSchema = new Schema<StoredMessage>({
    role: { type: String, enum: ROLES, required: true },
    content: { type: String, default: '' },
    timestamp: { type: Date, required: true },
}, { _id: false });

const ChatLogSchema = new Schema<ChatLogDocument>({
    session_id: { type: String, required: true, unique: true },
    messages: { type: [MessageSchema], default: [] },
    created_at: { type: Date, required: true },
    updated_at: { type: Date, required: true },
    metadata: { type: Schema.Types.Mixed },
}, { versionKey: false });

export function chatLogModel(connection: Connection): Model<ChatLogDocument> {
    return connection.model<ChatLogDocument>('ChatLog', ChatLogSchema, CHAT_LOG_COLLECTION);
}
