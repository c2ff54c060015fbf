import { NotFoundError } from '../../errors/app-error.js';
import {
  initialRetryState,
  type RetryState,
} from '../scheduler/transition.js';
import type { ArticleRef, ArticleStore } from './article-store.js';

interface StoredArticle {
  readonly ref: ArticleRef;
  state: RetryState;
}

export class InMemoryArticleStore implements ArticleStore {
  private readonly articles = new Map<string, StoredArticle>();

  add(ref: ArticleRef, state: RetryState = initialRetryState()): void {
    this.articles.set(ref.id, { ref, state });
  }

  get(articleId: string): RetryState {
    const stored = this.articles.get(articleId);
    if (!stored) throw new NotFoundError(`Article ${articleId}`);
    return stored.state;
  }

  get size(): number {
    return this.articles.size;
  }

  getRetryState(articleId: string): Promise<RetryState | undefined> {
    return Promise.resolve(this.articles.get(articleId)?.state);
  }

  saveRetryState(
    articleId: string,
    next: RetryState,
    expectedVersion: number
  ): Promise<boolean> {
    const stored = this.articles.get(articleId);
    if (!stored || stored.state.version !== expectedVersion) {
      return Promise.resolve(false);
    }
    stored.state = next;
    return Promise.resolve(true);
  }

  findDueForRetry(now: Date): Promise<ArticleRef[]> {
    const due: StoredArticle[] = [];
    for (const article of this.articles.values()) {
      const { status, nextRetryAt } = article.state;
      if (status === 'pending' && nextRetryAt && nextRetryAt <= now) {
        due.push(article);
      }
    }
    return Promise.resolve(
      due
        .sort(
          (a, b) =>
            (a.state.nextRetryAt?.getTime() ?? 0) -
            (b.state.nextRetryAt?.getTime() ?? 0)
        )
        .map((article) => article.ref)
    );
  }
}
