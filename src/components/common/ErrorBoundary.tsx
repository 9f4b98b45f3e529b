import { Component, type ErrorInfo, type ReactNode } from 'react';
import { Link } from 'react-router-dom';
import { logEvent } from '../../utils/logger';
import { normalizeErrorMessage } from '../../utils/errors';
import { buttonClassName } from '../ui/Button';

interface Props {
  children: ReactNode;
  fallback?: ReactNode;
  /** Changing this clears a caught error, e.g. when the route changes. */
  resetKey?: string;
}

interface State {
  error: unknown;
  hasError: boolean;
  resetKey?: string;
}

export class ErrorBoundary extends Component<Props, State> {
  public state: State = {
    error: null,
    hasError: false,
    resetKey: this.props.resetKey,
  };

  public static getDerivedStateFromError(error: unknown): Partial<State> {
    return { hasError: true, error };
  }

  public static getDerivedStateFromProps(props: Props, state: State): Partial<State> | null {
    if (props.resetKey !== state.resetKey) {
      return { hasError: false, error: null, resetKey: props.resetKey };
    }
    return null;
  }

  public componentDidCatch(error: unknown, errorInfo: ErrorInfo) {
    logEvent(
      'ui.render_error',
      { error: normalizeErrorMessage(error), stack: errorInfo.componentStack ?? undefined },
      { level: 'ERROR' },
    );
  }

  public render() {
    if (this.state.hasError) {
      if (this.props.fallback) {
        return this.props.fallback;
      }

      return (
        <div className="error-panel" role="alert">
          <h2>Something went wrong</h2>
          <p>{normalizeErrorMessage(this.state.error)}</p>
          <Link to="/" className={buttonClassName('secondary')}>
            Back to catalog
          </Link>
        </div>
      );
    }

    return this.props.children;
  }
}
