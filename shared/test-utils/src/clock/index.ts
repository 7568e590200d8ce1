export { FakeClock, FAKE_CLOCK_START, flushPromises } from './fake-clock';
