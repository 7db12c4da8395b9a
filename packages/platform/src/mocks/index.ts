export { createMemoryHost, SAMPLE_POSITION } from './memoryHost';
export type { MemoryHost, MemoryHostOptions } from './memoryHost';
