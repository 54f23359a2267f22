import { Router } from 'express';
import { hashPassword, sessionUser, verifyPassword, withUser } from '../auth.js';
import { flash, takeFlash } from '../flash.js';
import { loginSchema, parseForm, registerSchema } from '../forms.js';
import { renderPage } from '../render.js';
import type { Repository } from '../repo.js';
import { LoginScreen } from '../../../src/ui/screens/LoginScreen.js';

export function authRoutes(repo: Repository): Router {
  const router = Router();

  // GET / - Login and registration forms
  router.get('/', (req, res) => {
    if (sessionUser(req, repo)) {
      res.redirect('/dashboard');
      return;
    }
    renderPage(res, <LoginScreen flash={takeFlash(req)} />);
  });

  // POST / - Check credentials
  router.post('/', (req, res, next) => {
    const form = parseForm(loginSchema, req.body);
    const user = form.ok ? repo.findUserByUsername(form.data.username) : undefined;

    if (form.ok && user && verifyPassword(form.data.password, user.passwordHash)) {
      // Fresh session id on login so a planted cookie never gains the identity
      req.session.regenerate((err) => {
        if (err) {
          next(err);
          return;
        }
        req.session.userId = user.id;
        flash(req, 'success', 'Logged in successfully!');
        res.redirect('/dashboard');
      });
      return;
    }

    flash(req, 'danger', 'Wrong username or password!');
    renderPage(res, <LoginScreen flash={takeFlash(req)} />);
  });

  // POST /register - Create an account
  router.post('/register', (req, res) => {
    const form = parseForm(registerSchema, req.body);
    if (!form.ok) {
      flash(req, 'warning', form.message);
      res.redirect('/');
      return;
    }

    const { name, username, password, currency } = form.data;
    if (repo.findUserByUsername(username)) {
      flash(req, 'warning', 'That username is already taken!');
      res.redirect('/');
      return;
    }

    repo.createUser({ name, username, passwordHash: hashPassword(password), currency });
    flash(req, 'success', 'Registration successful! Now log in.');
    res.redirect('/');
  });

  // GET /logout
  router.get('/logout', (req, res) => {
    delete req.session.userId;
    flash(req, 'info', 'You have logged out.');
    res.redirect('/');
  });

  // POST /delete_account - Remove the user and everything they own
  router.post('/delete_account', withUser(repo, (req, res, user) => {
    repo.deleteUser(user.id);
    delete req.session.userId;
    flash(req, 'info', 'Your account and all its data were deleted.');
    res.redirect('/');
  }));

  return router;
}
