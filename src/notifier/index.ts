export type { AlertMessage, Notifier } from './types';
export { formatAlert } from './format';
export { FeishuNotifier, renderFeishuText } from './FeishuNotifier';
export type { FeishuNotifierOptions } from './FeishuNotifier';
