import { Router } from 'express';
import { assertOwns, OwnershipError, withUser } from '../auth.js';
import { flash, takeFlash } from '../flash.js';
import { parseForm, parseId, transactionSchema } from '../forms.js';
import { renderPage } from '../render.js';
import type { Repository } from '../repo.js';
import { today } from '../../../src/domain/computations.js';
import { TransactionsScreen } from '../../../src/ui/screens/TransactionsScreen.js';

export function transactionRoutes(repo: Repository): Router {
  const router = Router();

  // GET /transactions - Newest first, with budget categories for the form
  router.get('/transactions', withUser(repo, (req, res, user) => {
    renderPage(res, (
      <TransactionsScreen
        user={user}
        flash={takeFlash(req)}
        transactions={repo.listTransactions(user.id)}
        categories={repo.listBudgets(user.id).map((b) => b.category)}
        today={today()}
      />
    ));
  }));

  // POST /add_transaction
  router.post('/add_transaction', withUser(repo, (req, res, user) => {
    const form = parseForm(transactionSchema, req.body);
    if (!form.ok) {
      flash(req, 'danger', form.message);
      res.redirect('/transactions');
      return;
    }

    repo.createTransaction({
      userId: user.id,
      ...form.data,
      date: form.data.date ?? today(),
    });
    flash(req, 'success', 'Transaction added!');
    res.redirect('/transactions');
  }));

  // POST /delete_transaction/:id - Only the owner's rows
  router.post('/delete_transaction/:id', withUser(repo, (req, res, user) => {
    const id = parseId(req.params.id);
    try {
      const txn = assertOwns(id === null ? undefined : repo.findTransaction(id), user, 'Transaction');
      repo.deleteTransaction(txn.id);
      flash(req, 'info', 'Transaction deleted.');
    } catch (error) {
      if (!(error instanceof OwnershipError)) throw error;
      flash(req, 'danger', 'Could not delete the transaction.');
    }
    res.redirect('/transactions');
  }));

  return router;
}
