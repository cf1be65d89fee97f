/**
 * Progress of an asynchronous load, as broadcast to views.
 */
export type LoadingState<T> =
  | { status: 'init' }
  | { status: 'loading' }
  | { status: 'loaded'; data: T }
  | { status: 'not_found' }
  | { status: 'error'; message: string };
