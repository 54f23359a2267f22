import { Router } from 'express';
import { assertOwns, OwnershipError, withUser } from '../auth.js';
import { flash, takeFlash } from '../flash.js';
import { budgetSchema, budgetUpdateSchema, parseForm } from '../forms.js';
import { renderPage } from '../render.js';
import type { Repository } from '../repo.js';
import { budgetStatuses, currentMonth, spendingByCategory } from '../../../src/domain/computations.js';
import { periodLabel } from '../../../src/domain/format.js';
import { BudgetScreen } from '../../../src/ui/screens/BudgetScreen.js';

export function budgetRoutes(repo: Repository): Router {
  const router = Router();

  // GET /budget - Limits against this calendar month's spending
  router.get('/budget', withUser(repo, (req, res, user) => {
    const now = new Date();
    const spending = spendingByCategory(repo.listTransactionsInserted(user.id), currentMonth(now));
    renderPage(res, (
      <BudgetScreen
        user={user}
        flash={takeFlash(req)}
        statuses={budgetStatuses(repo.listBudgets(user.id), spending)}
        monthLabel={periodLabel({ month: now.getMonth() + 1, year: now.getFullYear() })}
      />
    ));
  }));

  // POST /save_budget - Create, or update the limit of an existing category
  router.post('/save_budget', withUser(repo, (req, res, user) => {
    const form = parseForm(budgetSchema, req.body);
    if (!form.ok) {
      flash(req, 'danger', form.message);
      res.redirect('/budget');
      return;
    }

    repo.saveBudget(user.id, form.data.category, form.data.amount);
    flash(req, 'success', 'Budget saved!');
    res.redirect('/budget');
  }));

  // POST /update_budget - Rename and/or re-limit a category
  router.post('/update_budget', withUser(repo, (req, res, user) => {
    const form = parseForm(budgetUpdateSchema, req.body);
    if (!form.ok) {
      flash(req, 'danger', form.message);
      res.redirect('/budget');
      return;
    }

    const { old_category: oldCategory, category, amount } = form.data;
    try {
      const budget = assertOwns(repo.findBudgetByCategory(user.id, oldCategory), user, 'Budget');
      const clash = category !== budget.category && repo.findBudgetByCategory(user.id, category);
      if (clash) {
        flash(req, 'danger', 'A budget for that category already exists.');
      } else {
        repo.updateBudget(budget.id, category, amount);
        flash(req, 'success', 'Category updated!');
      }
    } catch (error) {
      if (!(error instanceof OwnershipError)) throw error;
      flash(req, 'danger', 'Category not found.');
    }
    res.redirect('/budget');
  }));

  // POST /delete_budget/<category> - category may itself contain slashes
  router.post(/^\/delete_budget\/(.+)$/, withUser(repo, (req, res, user) => {
    const category = req.params[0] ?? '';
    try {
      const budget = assertOwns(repo.findBudgetByCategory(user.id, category), user, 'Budget');
      repo.deleteBudget(budget.id);
      flash(req, 'info', 'Category deleted.');
    } catch (error) {
      if (!(error instanceof OwnershipError)) throw error;
      flash(req, 'danger', 'Could not delete the category.');
    }
    res.redirect('/budget');
  }));

  return router;
}
