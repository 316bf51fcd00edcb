/**
 * Alpha Vantage CURRENCY_EXCHANGE_RATE response types
 */

export const QUOTE_OBJECT_KEY = 'Realtime Currency Exchange Rate';

export interface AlphaVantageQuote {
  '1. From_Currency Code': string;
  '2. From_Currency Name': string;
  '3. To_Currency Code': string;
  '4. To_Currency Name': string;
  '5. Exchange Rate': string; // Decimal string, e.g. "0.92010000"
  '6. Last Refreshed': string;
  '7. Time Zone': string;
  '8. Bid Price': string;
  '9. Ask Price': string;
}
