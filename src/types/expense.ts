export interface Expense {
  id: number;
  date: string;
  amount: number;
  category: string;
  subcategory: string;
  note: string;
}

export interface NewExpense {
  date: string;
  amount: number;
  category: string;
  subcategory?: string | null;
  note?: string | null;
}

export interface CategoryTotal {
  category: string;
  total_amount: number;
}
