import type { AppConfig } from '../config';
import type { Character, Contact, Gadget, Stone } from '../schemas';
import type { IdentityGuards } from '../guards/identity';
import type { SessionPool } from '../guards/session';
import type { JobContext } from '../tasks/jobs';
import type { IntelFeedClient } from '../upstream/intelFeed';
import type { DashboardRenderer } from '../views/dashboard';
import type { Catalog, RecordStore } from './recordStore';

/**
 * Everything a route module needs, created once per app by `buildApp`.
 * Nothing here is module-level state, so two apps never share a store.
 */
export interface AppContext {
  config: AppConfig;
  gadgets: Catalog<Gadget>;
  stones: Catalog<Stone>;
  contacts: RecordStore<Contact>;
  characters: RecordStore<Character>;
  guards: IdentityGuards;
  sessions: SessionPool;
  intelFeed: IntelFeedClient;
  dashboards: DashboardRenderer;
  jobs: JobContext;
}
