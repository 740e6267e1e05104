/**
 * @module yahoo-finance-singleton
 * @description Shared yahoo-finance2 client used by the Yahoo market data source and the returns export script
 *
 * NOTES:
 * - Survey notices are suppressed to keep pipeline logs readable
 * - Tests replace this module with `vi.mock('@/lib/yahoo-finance-singleton')`
 */

import YahooFinance from 'yahoo-finance2';

const yahooFinance = new YahooFinance({ suppressNotices: ['yahooSurvey'] });

export default yahooFinance;
