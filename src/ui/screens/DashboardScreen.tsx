import { formatMoney, periodLabel } from '../../domain/format.js';
import type { DashboardSummary, FlashMessage, User } from '../../domain/types.js';
import { CategoryChart } from '../components/CategoryChart.js';
import { DailyNetChart } from '../components/DailyNetChart.js';
import { HealthCard } from '../components/HealthCard.js';
import { Layout } from '../components/Layout.js';
import { MonthFilter } from '../components/MonthFilter.js';

interface DashboardScreenProps {
  user: User;
  flash: FlashMessage[];
  summary: DashboardSummary;
  years: number[];
}

export function DashboardScreen({ user, flash, summary, years }: DashboardScreenProps) {
  const { currency } = user;

  return (
    <Layout title="Dashboard" flash={flash} user={user} active="dashboard">
      <div className="page-header">
        <h1>{periodLabel(summary.period)}</h1>
        <MonthFilter value={summary.period} years={years} />
      </div>

      <div className="totals-grid">
        <div className="total-card income">
          <span className="total-label">Income</span>
          <span className="total-value">{formatMoney(summary.income, currency)}</span>
        </div>
        <div className="total-card expense">
          <span className="total-label">Expenses</span>
          <span className="total-value">{formatMoney(summary.expenses, currency)}</span>
        </div>
        <div className={`total-card ${summary.balance < 0 ? 'negative' : ''}`}>
          <span className="total-label">Balance</span>
          <span className="total-value">{formatMoney(summary.balance, currency)}</span>
        </div>
        <div className="total-card">
          <span className="total-label">Saved toward goals</span>
          <span className="total-value">{formatMoney(summary.totalSavings, currency)}</span>
        </div>
      </div>

      <HealthCard breakdown={summary.health} hasIncome={summary.income > 0} />

      <div className="charts-grid">
        <CategoryChart totals={summary.expensesByCategory} currency={currency} />
        <DailyNetChart series={summary.dailyNet} />
      </div>
    </Layout>
  );
}
