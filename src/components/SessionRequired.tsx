import React from 'react';

interface SessionRequiredProps {
  /** localStorage key the login flow writes the session token under. */
  tokenKey: string;
  loginUrl?: string;
}

/** Shown in place of the dashboard when no session token is stored. */
export const SessionRequired: React.FC<SessionRequiredProps> = ({ tokenKey, loginUrl }) => {
  return (
    <div className="min-h-screen bg-zinc-950 text-zinc-100 flex items-center justify-center p-6">
      <section className="w-full max-w-md rounded-lg border border-zinc-800 bg-zinc-900/80 p-5">
        <h1 className="text-lg font-semibold text-zinc-100">Sign in to see live prices</h1>
        <p className="mt-2 text-sm text-zinc-400">
          No session token under <code className="font-mono text-zinc-300">{tokenKey}</code>. Prices, trading
          status and alerts connect once you sign in.
        </p>
        {loginUrl && (
          <a href={loginUrl} className="mt-4 inline-block rounded bg-blue-600 px-3 py-1.5 text-sm font-medium text-white hover:bg-blue-500">
            Go to sign in
          </a>
        )}
      </section>
    </div>
  );
};
