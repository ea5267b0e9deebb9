import type { TransactionStatus } from '../../src/config/constants';
import { DataSnapshot } from '../../src/models/data-snapshot';
import type { Customer, Transaction } from '../../src/types';

export const NOW = new Date('2024-06-30T12:00:00.000Z');

export function daysBefore(date: Date, days: number): Date {
  return new Date(date.getTime() - days * 24 * 60 * 60 * 1000);
}

export function makeCustomer(customerId: string, registrationDate: string = '2024-01-01T00:00:00.000Z'): Customer {
  return {
    customerId,
    registrationDate: new Date(registrationDate),
    email: `${customerId.toLowerCase()}@example.com`,
  };
}

let sequence = 0;

export function makeTransaction(
  customerId: string,
  amount: number,
  transactionDate: Date | string,
  status: TransactionStatus = 'completed'
): Transaction {
  sequence++;
  return {
    transactionId: `TXN_${String(sequence).padStart(8, '0')}`,
    customerId,
    amount,
    transactionDate: typeof transactionDate === 'string' ? new Date(transactionDate) : transactionDate,
    status,
  };
}

export function makeSnapshot(customers: Customer[], transactions: Transaction[]): DataSnapshot {
  return new DataSnapshot({ customers, transactions }, 'memory', NOW);
}
