import type { TransactionStatus } from '../config/constants';

export interface Customer {
  customerId: string;
  registrationDate: Date;
  firstName?: string;
  lastName?: string;
  email?: string;
  phone?: string;
  age?: number;
  city?: string;
  state?: string;
  segment?: string;
  isActive?: boolean;
}

export interface Transaction {
  transactionId: string;
  customerId: string;
  transactionDate: Date;
  // Signed: refunds are negative
  amount: number;
  status: TransactionStatus;
  currency?: string;
  transactionType?: string;
  merchant?: string;
  category?: string;
  paymentMethod?: string;
}

export interface CustomerEvent {
  eventId: string;
  customerId: string;
  timestamp: Date;
  eventType: string;
  pageUrl?: string;
  sessionId?: string;
  deviceType?: string;
  browser?: string;
}

export interface Product {
  productId: string;
  name: string;
  category: string;
  price: number;
  subcategory?: string;
  cost?: number;
  stockQuantity?: number;
  supplier?: string;
  createdDate?: Date;
  isActive?: boolean;
}

export type EntityName = 'customers' | 'transactions' | 'events' | 'products';

export interface CommerceDataset {
  customers: Customer[];
  transactions: Transaction[];
  events: CustomerEvent[];
  products: Product[];
}
