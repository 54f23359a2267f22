import { Router, type Request } from 'express';
import { withUser } from '../auth.js';
import { takeFlash } from '../flash.js';
import { renderPage } from '../render.js';
import type { Repository } from '../repo.js';
import { dashboardSummary, parsePeriod, selectableYears } from '../../../src/domain/computations.js';
import type { DashboardSummary, User } from '../../../src/domain/types.js';
import { DashboardScreen } from '../../../src/ui/screens/DashboardScreen.js';

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function summaryFor(req: Request, repo: Repository, user: User): DashboardSummary {
  const period = parsePeriod(queryString(req.query.month), queryString(req.query.year));
  return dashboardSummary(
    repo.listTransactionsInserted(user.id),
    repo.listBudgets(user.id),
    repo.listGoals(user.id),
    period,
  );
}

export function dashboardRoutes(repo: Repository): Router {
  const router = Router();

  // GET /dashboard?month=&year=
  router.get('/dashboard', withUser(repo, (req, res, user) => {
    renderPage(res, (
      <DashboardScreen
        user={user}
        flash={takeFlash(req)}
        summary={summaryFor(req, repo, user)}
        years={selectableYears()}
      />
    ));
  }));

  // GET /api/dashboard?month=&year= - Same numbers as JSON
  router.get('/api/dashboard', withUser(repo, (req, res, user) => {
    const summary = summaryFor(req, repo, user);
    res.json({
      ...summary,
      currency: user.currency,
      budgetMap: Object.fromEntries(summary.budgetMap),
    });
  }, {
    onAnonymous: (_req, res) => {
      res.status(401).json({ error: 'Not authenticated' });
    },
  }));

  return router;
}
