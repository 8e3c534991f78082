import { parseDate } from '../churn/feature-extractor';
import type { CreateCustomerDto } from './dto/create-customer.dto';
import type { NewCustomer } from './interfaces/customer-store.interface';

/**
 * Clean one uploaded row before it is stored: trimmed name (default
 * 'Unknown'), lower-cased email, dates as 'YYYY-MM-DD' or null when they do
 * not parse, numeric counters defaulted.
 */
export function normalizeCustomer(row: CreateCustomerDto): NewCustomer {
  return {
    name: row.name?.trim() || 'Unknown',
    email: row.email.trim().toLowerCase(),
    phone: row.phone?.trim() || null,
    registrationDate: toDateString(row.registrationDate),
    lastTransactionDate: toDateString(row.lastTransactionDate),
    transactionCount: row.transactionCount ?? 0,
    totalSpent: row.totalSpent ?? 0,
    engagementScore: row.engagementScore ?? 50,
    supportTickets: row.supportTickets ?? 0,
  };
}

export function toDateString(
  value: Date | string | null | undefined,
): string | null {
  const date = parseDate(value);
  return date ? date.toISOString().slice(0, 10) : null;
}
