export {
  AccessControlLedger,
  type AccessControlLedgerOptions,
  type AclFact,
  type AclFactListener,
} from './ledger.js';
