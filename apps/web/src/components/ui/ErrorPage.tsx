// ABOUTME: Reusable error page component for failed page requests
// ABOUTME: Offers a way back to the generator (or another page the caller names)

import { Layout } from '../layout';
import { Button } from './Button';

interface ErrorPageProps {
  title: string;
  message: string;
  suggestion?: string;
  backUrl?: string;
  backLabel?: string;
}

export function ErrorPage({ title, message, suggestion, backUrl = '/', backLabel }: ErrorPageProps) {
  return (
    <Layout title={title}>
      <div class="text-center" style={{ paddingTop: '4rem' }}>
        <h1>{title}</h1>
        <p class="text-muted">{message}</p>
        {suggestion && <p class="text-muted">{suggestion}</p>}
        <p class="mt-2">
          <Button href={backUrl}>{backLabel || 'Generate an album'}</Button>
        </p>
      </div>
    </Layout>
  );
}

export function NotFoundPage({ what = 'page' }: { what?: string }) {
  return (
    <ErrorPage
      title="Not Found"
      message={`The ${what} you requested could not be found.`}
      suggestion="It may have been deleted from the history."
      backUrl="/history"
      backLabel="Browse history"
    />
  );
}
