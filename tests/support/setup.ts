import { Logger } from '../../src/utils/logger';

// refusals and injected faults log at warn/error; keep test output to real failures
Logger.setLevel('error');
