import { formatMoney } from '../../domain/format.js';
import { TRANSACTION_TYPES, type FlashMessage, type Transaction, type User } from '../../domain/types.js';
import { Layout } from '../components/Layout.js';

interface TransactionsScreenProps {
  user: User;
  flash: FlashMessage[];
  transactions: Transaction[];
  categories: string[];
  today: string;
}

export function TransactionsScreen({ user, flash, transactions, categories, today }: TransactionsScreenProps) {
  return (
    <Layout title="Transactions" flash={flash} user={user} active="transactions">
      <h1>Transactions</h1>

      <section className="card">
        <h2>Add transaction</h2>
        <form className="entry-form" method="post" action="/add_transaction">
          <select name="type" defaultValue="expense" aria-label="Type">
            {TRANSACTION_TYPES.map((t) => (
              <option key={t} value={t}>
                {t === 'income' ? 'Income' : 'Expense'}
              </option>
            ))}
          </select>
          <input name="amount" placeholder="Amount" inputMode="decimal" required />
          {categories.length > 0 && (
            <select name="category_select" defaultValue="" aria-label="Budget category">
              <option value="">(type a category)</option>
              {categories.map((c) => (
                <option key={c} value={c}>
                  {c}
                </option>
              ))}
            </select>
          )}
          <input name="category" placeholder="Category" />
          <input name="payment" placeholder="Payment method" defaultValue="Cash" />
          <input name="date" type="date" defaultValue={today} />
          <input name="description" placeholder="Description" />
          <button type="submit">Add</button>
        </form>
      </section>

      {transactions.length === 0 ? (
        <p className="no-data">No transactions yet</p>
      ) : (
        <table className="txn-table">
          <thead>
            <tr>
              <th>Date</th>
              <th>Category</th>
              <th>Description</th>
              <th>Payment</th>
              <th className="num">Amount</th>
              <th />
            </tr>
          </thead>
          <tbody>
            {transactions.map((t) => (
              <tr key={t.id} className={t.type}>
                <td>{t.date}</td>
                <td>{t.category}</td>
                <td>{t.description}</td>
                <td>{t.paymentMethod}</td>
                <td className="num">
                  {t.type === 'expense' ? '−' : '+'}
                  {formatMoney(t.amount, user.currency)}
                </td>
                <td>
                  <form method="post" action={`/delete_transaction/${t.id}`}>
                    <button type="submit" className="danger">Delete</button>
                  </form>
                </td>
              </tr>
            ))}
          </tbody>
        </table>
      )}
    </Layout>
  );
}
