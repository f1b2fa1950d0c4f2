export { describeZod } from './zod-descriptor.js';
export type { DescribeZodOptions } from './zod-descriptor.js';
