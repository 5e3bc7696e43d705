import { systemClock, type Clock } from "./clock";
import type { EventBus } from "./event-bus";
import type { InviteDispatcher } from "./invite-dispatcher";
import { KeyedMutex } from "./keyed-mutex";
import { OutreachTracker } from "./outreach-tracker";
import { RegistrationLedger } from "./registration-ledger";
import type { EngagementStore } from "./repositories";
import { ReportingAggregator } from "./reporting";
import { SessionCatalog } from "./session-catalog";
import { TrustScoreEngine } from "./trust-score";
import type { ServiceLogger } from "../logger";

export interface EngagementServices {
  store: EngagementStore;
  clock: Clock;
  catalog: SessionCatalog;
  ledger: RegistrationLedger;
  outreach: OutreachTracker;
  trust: TrustScoreEngine;
  reporting: ReportingAggregator;
}

export interface EngagementServicesOptions {
  store: EngagementStore;
  clock?: Clock;
  dispatcher?: InviteDispatcher;
  events?: EventBus;
  logger?: ServiceLogger;
}

export function createEngagementServices(options: EngagementServicesOptions): EngagementServices {
  const { store, dispatcher, events, logger } = options;
  const clock = options.clock ?? systemClock;
  const mutex = new KeyedMutex();

  const trust = new TrustScoreEngine({ customers: store.customers, clock, mutex, events, logger });
  const catalog = new SessionCatalog({
    sessions: store.sessions,
    customers: store.customers,
    clock,
    dispatcher,
    events,
    logger,
  });
  const ledger = new RegistrationLedger({
    sessions: store.sessions,
    customers: store.customers,
    registrations: store.registrations,
    followUps: store.followUps,
    trust,
    clock,
    mutex,
    dispatcher,
    events,
    logger,
  });
  const outreach = new OutreachTracker({
    outreach: store.outreach,
    customers: store.customers,
    trust,
    clock,
    mutex,
    events,
    logger,
  });

  return {
    store,
    clock,
    catalog,
    ledger,
    outreach,
    trust,
    reporting: new ReportingAggregator(store),
  };
}
