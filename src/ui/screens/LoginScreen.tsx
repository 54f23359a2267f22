import type { FlashMessage } from '../../domain/types.js';
import { Layout } from '../components/Layout.js';

interface LoginScreenProps {
  flash: FlashMessage[];
}

export function LoginScreen({ flash }: LoginScreenProps) {
  return (
    <Layout title="Log in" flash={flash}>
      <div className="auth-grid">
        <section className="card">
          <h2>Log in</h2>
          <form method="post" action="/">
            <label>
              Username
              <input name="username" autoComplete="username" required />
            </label>
            <label>
              Password
              <input name="password" type="password" autoComplete="current-password" required />
            </label>
            <button type="submit">Log in</button>
          </form>
        </section>

        <section className="card">
          <h2>Create an account</h2>
          <form method="post" action="/register">
            <label>
              Name
              <input name="name" autoComplete="name" />
            </label>
            <label>
              Username
              <input name="username" autoComplete="username" required />
            </label>
            <label>
              Password
              <input name="password" type="password" autoComplete="new-password" required />
            </label>
            <label>
              Currency
              <input name="currency" defaultValue="UAH" maxLength={10} />
            </label>
            <button type="submit">Register</button>
          </form>
        </section>
      </div>
    </Layout>
  );
}
