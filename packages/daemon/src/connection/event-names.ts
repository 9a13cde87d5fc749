/**
 * Events every WsGatewayConnection exposes unless configured otherwise
 */
export const DEFAULT_EVENT_NAMES = [
  'connectedEvent',
  'disconnectedEvent',
  'updateEvent',
  'pendingTickersEvent',
  'barUpdateEvent',
  'newOrderEvent',
  'orderModifyEvent',
  'cancelOrderEvent',
  'openOrderEvent',
  'orderStatusEvent',
  'execDetailsEvent',
  'commissionReportEvent',
  'updatePortfolioEvent',
  'positionEvent',
  'accountValueEvent',
  'accountSummaryEvent',
  'pnlEvent',
  'pnlSingleEvent',
  'scannerDataEvent',
  'tickNewsEvent',
  'newsBulletinEvent',
  'errorEvent',
  'timeoutEvent',
] as const;
