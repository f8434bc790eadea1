/**
 * Widget storage type definitions.
 */

export type { IWidgetRecord, IWidgetRegistration } from './IWidgetRecord.js';
export type { IWidgetStore } from './IWidgetStore.js';
