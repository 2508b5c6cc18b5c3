/**
 * Events Module
 * @module api/events
 */

export { TypedEventEmitter } from './emitter';
