import { Router } from 'express';
import { assertOwns, OwnershipError, withUser } from '../auth.js';
import { flash, takeFlash } from '../flash.js';
import { goalSchema, goalUpdateSchema, parseForm, parseId } from '../forms.js';
import { renderPage } from '../render.js';
import type { Repository } from '../repo.js';
import { goalProgress } from '../../../src/domain/computations.js';
import type { Goal, User } from '../../../src/domain/types.js';
import { SavingsScreen } from '../../../src/ui/screens/SavingsScreen.js';

function findOwnGoal(repo: Repository, rawId: string | undefined, user: User): Goal {
  const id = parseId(rawId);
  return assertOwns(id === null ? undefined : repo.findGoal(id), user, 'Goal');
}

export function savingsRoutes(repo: Repository): Router {
  const router = Router();

  // GET /savings - Goals with progress
  router.get('/savings', withUser(repo, (req, res, user) => {
    renderPage(res, (
      <SavingsScreen
        user={user}
        flash={takeFlash(req)}
        goals={repo.listGoals(user.id).map(goalProgress)}
      />
    ));
  }));

  // POST /add_savings - New goal
  router.post('/add_savings', withUser(repo, (req, res, user) => {
    const form = parseForm(goalSchema, req.body);
    if (!form.ok) {
      flash(req, 'danger', form.message);
      res.redirect('/savings');
      return;
    }

    repo.createGoal({ userId: user.id, ...form.data });
    flash(req, 'success', 'Goal added!');
    res.redirect('/savings');
  }));

  // POST /update_goal/:id - Missing fields keep their values; a missing deadline clears it
  router.post('/update_goal/:id', withUser(repo, (req, res, user) => {
    let goal: Goal;
    try {
      goal = findOwnGoal(repo, req.params.id, user);
    } catch (error) {
      if (!(error instanceof OwnershipError)) throw error;
      flash(req, 'danger', 'Goal not found.');
      res.redirect('/savings');
      return;
    }

    const form = parseForm(goalUpdateSchema, req.body);
    if (!form.ok) {
      flash(req, 'danger', form.message);
      res.redirect('/savings');
      return;
    }

    repo.updateGoal(goal.id, {
      name: form.data.name ?? goal.name,
      target: form.data.target ?? goal.target,
      current: form.data.current ?? goal.current,
      deadline: form.data.deadline,
    });
    flash(req, 'success', 'Goal updated!');
    res.redirect('/savings');
  }));

  // POST /delete_goal/:id
  router.post('/delete_goal/:id', withUser(repo, (req, res, user) => {
    try {
      const goal = findOwnGoal(repo, req.params.id, user);
      repo.deleteGoal(goal.id);
      flash(req, 'info', 'Goal deleted.');
    } catch (error) {
      if (!(error instanceof OwnershipError)) throw error;
      flash(req, 'danger', 'Could not delete the goal.');
    }
    res.redirect('/savings');
  }));

  return router;
}
