export {
  createTestPlayer,
  createTestPlayers,
  createTestStore,
  resetRecordCounter,
  salaryRecord,
  statsRecord,
  type PlayerSeed,
  type TestStore,
} from './factories';
export { CLOCK_START, createClock, type TestClock } from './mocks';
