import { BadRequestError, ForbiddenError, UnauthorizedError } from '../errors';
import { paginationQuerySchema, type Pagination } from '../schemas';
import { parseInput } from '../validation';
import type { CurrentUser, VerifiedUser } from '../types';
import { GuardChain, type Stage } from './chain';

export type CurrentUserProvider = () => CurrentUser | Promise<CurrentUser>;

/** Stand-in for a session lookup; always Batman. */
export const simulatedCurrentUser: CurrentUserProvider = () => ({
  username: 'batman',
  email: 'bruce@wayne.enterprises',
  is_active: true,
});

export function extractHeader(header: string): Stage<void, string> {
  const key = header.toLowerCase();
  return function extractHeaderStage(_input, req) {
    const raw = req.headers[key];
    const value = Array.isArray(raw) ? raw[0] : raw;
    if (!value) {
      throw new UnauthorizedError(`${header} header missing (Authentication required)`);
    }
    return value;
  };
}

export function verifyApiKey(secret: string): Stage<string, VerifiedUser> {
  return function verifyApiKeyStage(apiKey, req) {
    if (apiKey !== secret) {
      throw new ForbiddenError('Invalid API Key provided (Access Denied)');
    }
    const user: VerifiedUser = { user_id: 'gcpd_officer_jim', permissions: ['read_cases'] };
    req.log.debug({ user_id: user.user_id }, 'API key verified');
    return user;
  };
}

export function loadCurrentUser(provider: CurrentUserProvider): Stage<void, CurrentUser> {
  return function loadCurrentUserStage() {
    return provider();
  };
}

export const requireActive: Stage<CurrentUser, CurrentUser> = function requireActiveStage(user) {
  if (!user.is_active) throw new BadRequestError('User account is inactive.');
  return user;
};

export function requireAdmin(adminUsername: string): Stage<CurrentUser, CurrentUser> {
  return function requireAdminStage(user, req) {
    req.log.debug({ username: user.username }, 'Checking admin privileges');
    if (user.username !== adminUsername) {
      throw new ForbiddenError('Admin privileges required. Access denied.');
    }
    return user;
  };
}

export const pagination: Stage<void, Pagination> = function paginationStage(_input, req) {
  return parseInput(paginationQuerySchema, req.query);
};

export interface IdentityGuardOptions {
  apiKeySecret: string;
  adminUsername: string;
  currentUser: CurrentUserProvider;
}

export interface IdentityGuards {
  verifiedUser: GuardChain<VerifiedUser>;
  currentUser: GuardChain<CurrentUser>;
  adminUser: GuardChain<CurrentUser>;
  pagination: GuardChain<Pagination>;
}

export function createIdentityGuards(options: IdentityGuardOptions): IdentityGuards {
  const currentUser = GuardChain.from(loadCurrentUser(options.currentUser)).then(requireActive);
  return {
    verifiedUser: GuardChain.from(extractHeader('X-API-Key')).then(verifyApiKey(options.apiKeySecret)),
    currentUser,
    adminUser: currentUser.then(requireAdmin(options.adminUsername)),
    pagination: GuardChain.from(pagination),
  };
}
