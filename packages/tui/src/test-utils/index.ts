export { FakeTerminal } from './fake-terminal.js';
