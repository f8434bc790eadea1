export {
    generateSessionToken,
    generateWidgetToken,
    getTokenSecret,
    resolveTokenSecret,
    validateSessionToken,
    validateWidgetToken
} from './session-token.js';
export type { TokenValidation } from './session-token.js';
export { checkWidgetPermission, hasPermission, isAdmin } from './access.js';
