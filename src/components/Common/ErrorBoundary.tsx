import React from 'react';
import { AlertCircle } from 'lucide-react';

interface ErrorBoundaryProps {
  children: React.ReactNode;
  onError?: (error: Error, errorInfo: React.ErrorInfo) => void;
}

interface ErrorBoundaryState {
  error: Error | null;
}

export class ErrorBoundary extends React.Component<ErrorBoundaryProps, ErrorBoundaryState> {
  state: ErrorBoundaryState = { error: null };

  static getDerivedStateFromError(error: Error): ErrorBoundaryState {
    return { error };
  }

  componentDidCatch(error: Error, errorInfo: React.ErrorInfo) {
    if (this.props.onError) {
      this.props.onError(error, errorInfo);
    } else {
      console.error('Unhandled render error:', error, errorInfo);
    }
  }

  private reset = () => {
    this.setState({ error: null });
  };

  render() {
    if (this.state.error) {
      return (
        <div role="alert" className="bg-red-50 border border-red-200 rounded-lg p-4">
          <div className="flex items-center gap-2 text-red-800 font-medium">
            <AlertCircle className="w-5 h-5" />
            Something went wrong
          </div>
          <p className="text-sm text-red-700 mt-2">{this.state.error.message}</p>
          <button
            onClick={this.reset}
            className="mt-3 px-3 py-1 border border-red-300 rounded text-sm text-red-800 hover:bg-red-100"
          >
            Try again
          </button>
        </div>
      );
    }

    return this.props.children;
  }
}
