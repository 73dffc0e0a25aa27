export { consoleTransport, formatPretty, type ConsoleTransportOptions, type FormatOptions } from './console';
export { memoryTransport, type MemoryTransport } from './memory';
