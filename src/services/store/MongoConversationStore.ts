// src/services/store/MongoConversationStore.ts

import mongoose, { type Connection, type Model } from 'mongoose';
import { BaseService } from '../base/BaseService';
import type { ServiceConfig } from '../base/types';
import type { ConversationLog, Message } from '../../models/chat.model';
import { chatLogModel, type ChatLogDocument, type StoredMessage } from '../../models/chatLog.model';
import { StoreError, errorMessage } from '../../errors';
import type { ConversationStore } from './types';

export interface MongoConversationStoreConfig extends ServiceConfig {
    url: string;
    databaseName: string;
    /** Unopened connection to register the model on; one is created when omitted. */
    connection?: Connection;
}

const toMessage = (stored: StoredMessage): Message => ({
    role: stored.role,
    content: stored.content,
    timestamp: new Date(stored.timestamp),
});

export class MongoConversationStore extends BaseService implements ConversationStore {
    private url: string;
    private databaseName: string;
    private connection: Connection;
    private model: Model<ChatLogDocument>;

    constructor(config: MongoConversationStoreConfig) {
        super(config);
        this.url = config.url;
        this.databaseName = config.databaseName;
        this.connection = config.connection ?? mongoose.createConnection();
        this.model = chatLogModel(this.connection);
    }

    async connect(): Promise<void> {
        try {
            await this.connection.openUri(this.url, { dbName: this.databaseName, autoIndex: false });
            await this.model.createIndexes();
            this.logger.info('Connected to MongoDB', { database: this.connection.name });
        } catch (error) {
            throw new StoreError(`Failed to connect to MongoDB: ${errorMessage(error)}`, { cause: error });
        }
    }

    async close(): Promise<void> {
        await this.connection.close();
        this.logger.info('Disconnected from MongoDB');
    }

    async getRecentMessages(sessionId: string, limit: number): Promise<Message[]> {
        if (limit <= 0) return [];
        try {
            const doc = await this.model
                .findOne({ session_id: sessionId }, { messages: { $slice: -limit } })
                .lean<ChatLogDocument>()
                .exec();
            return doc ? doc.messages.map(toMessage) : [];
        } catch (error) {
            throw new StoreError(`Failed to read recent messages: ${errorMessage(error)}`, { cause: error });
        }
    }

    async appendMessages(sessionId: string, messages: Message[], at: Date): Promise<void> {
        try {
            await this.model
                .updateOne(
                    { session_id: sessionId },
                    {
                        $push: { messages: { $each: messages.map((msg) => ({ ...msg })) } },
                        $set: { updated_at: at },
                        $setOnInsert: { created_at: at },
                    },
                    { upsert: true }
                )
                .exec();
        } catch (error) {
            throw new StoreError(`Failed to append messages: ${errorMessage(error)}`, { cause: error });
        }
    }

    async getConversation(sessionId: string): Promise<ConversationLog | null> {
        let doc: ChatLogDocument | null;
        try {
            doc = await this.model.findOne({ session_id: sessionId }).lean<ChatLogDocument>().exec();
        } catch (error) {
            throw new StoreError(`Failed to read conversation: ${errorMessage(error)}`, { cause: error });
        }
        if (!doc) return null;

        const log: ConversationLog = {
            sessionId: doc.session_id,
            messages: doc.messages.map(toMessage),
            createdAt: new Date(doc.created_at),
            updatedAt: new Date(doc.updated_at),
        };
        if (doc.metadata) log.metadata = doc.metadata;
        return log;
    }
}
