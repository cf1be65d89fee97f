import { createStore, type StoreApi } from 'zustand/vanilla';
import type { LoadingState, Review } from '@local-review/shared';
import type { AppEvent, AppState } from '../events/event';
import { AppEventService } from './service';

interface AppStateStore extends AppState {
  setReviews: (state: LoadingState<Review[]>) => void;
  setGitBranches: (state: LoadingState<string[]>) => void;
}

const INITIAL_STATE: AppState = {
  reviews: { status: 'init' },
  gitBranches: { status: 'init' },
};

export function createAppStateStore(): StoreApi<AppStateStore> {
  return createStore<AppStateStore>((set) => ({
    ...INITIAL_STATE,
    setReviews: (reviews) => set({ reviews }),
    setGitBranches: (gitBranches) => set({ gitBranches }),
  }));
}

/**
 * Caches the latest loading states and broadcasts a snapshot to every view
 * whenever one of them changes.
 */
export class StateService extends AppEventService {
  readonly name = 'state';
  protected readonly eventTypes = new Set<AppEvent['type']>(['reviews_loading_state', 'git_branches_loading_state']);

  constructor(private readonly store: StoreApi<AppStateStore> = createAppStateStore()) {
    super();
  }

  getState(): AppState {
    const { reviews, gitBranches } = this.store.getState();
    return { reviews, gitBranches };
  }

  protected handleAppEvent(event: AppEvent): AppEvent[] {
    switch (event.type) {
      case 'reviews_loading_state':
        this.store.getState().setReviews(event.state);
        break;
      case 'git_branches_loading_state':
        this.store.getState().setGitBranches(event.state);
        break;
      default:
        return [];
    }

    return [{ type: 'state_update', state: this.getState() }];
  }
}
