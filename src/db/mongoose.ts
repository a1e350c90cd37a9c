import mongoose from 'mongoose';
import logger from '../util/logger.js';
import type { AppConfig } from '../config.js';

export function sanitizeMongoUri(uri: string): string {
    // Remove credentials between scheme and '@'
    const match = uri.match(/^(mongodb(?:\+srv)?:\/\/)([^@]+)@(.+)$/i);
    if (match) {
        return `${match[1]}***@${match[3]}`;
    }
    return uri;
}

export function buildMongoUri(mongo: AppConfig['mongo']): string {
    const creds = mongo.user && mongo.pass ? `${encodeURIComponent(mongo.user)}:${encodeURIComponent(mongo.pass)}@` : '';
    return `mongodb://${creds}${mongo.host}:${mongo.port}/${mongo.dbName}?authSource=admin`;
}

export async function connectMongoose(mongo: AppConfig['mongo']) {
    const uri = buildMongoUri(mongo);
    logger.info({ target: sanitizeMongoUri(uri) }, 'Connecting to MongoDB');
    await mongoose.connect(uri, { serverSelectionTimeoutMS: 15000 });
    logger.info('MongoDB connected');
}

export async function disconnectMongoose() {
    await mongoose.disconnect();
}

export default mongoose;
