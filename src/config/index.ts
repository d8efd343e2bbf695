import { env } from './env.js';

export { env } from './env.js';
export type { AppEnvironment } from './env.js';

// Commonly used config values
export const businessHours = () => ({
  startHour: env.BUSINESS_HOURS_START,
  endHour: env.BUSINESS_HOURS_END
});
