import React from 'react';
import { AlertCircle } from 'lucide-react';

interface ErrorBoundaryState {
  hasError: boolean;
  message?: string;
}

export class ErrorBoundary extends React.Component<React.PropsWithChildren, ErrorBoundaryState> {
  state: ErrorBoundaryState = { hasError: false };

  static getDerivedStateFromError(error: unknown): ErrorBoundaryState {
    return { hasError: true, message: error instanceof Error ? error.message : String(error) };
  }

  componentDidCatch(error: unknown, info: React.ErrorInfo) {
    console.error('[ui] Report failed to render:', error, info.componentStack);
  }

  reset = () => this.setState({ hasError: false, message: undefined });

  render() {
    if (this.state.hasError) {
      return (
        <div role="alert" className="max-w-xl mx-auto mt-16 p-6 bg-white rounded-2xl border border-red-200 shadow-sm space-y-3">
          <h1 className="font-bold text-red-700 flex items-center gap-2"><AlertCircle className="w-5 h-5" /> Report failed to render</h1>
          <p className="text-sm text-slate-600">{this.state.message}</p>
          <button onClick={this.reset} className="px-4 py-2 rounded-lg text-sm font-medium bg-white border border-slate-300 hover:border-green-600">
            Reset View
          </button>
        </div>
      );
    }
    return this.props.children;
  }
}
