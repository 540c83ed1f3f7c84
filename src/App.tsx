import { memo, useState } from 'react';
import { Database, Loader2, MousePointerClick, Settings, Table, AlertCircle } from 'lucide-react';
import type { SelectionResult } from './types';
import { DATA_URL } from './services/api';
import { useGridData } from './hooks/useGridData';
import { parsePageSize, serializeConfig } from './utils/gridConfig';
import { MasterDetailGrid } from './components/MasterDetailGrid/MasterDetailGrid';
import { GridTabs, JsonView } from './components/GridTabs/GridTabs';
import { ErrorBoundary } from './components/Common/ErrorBoundary';

const DETAIL_PAGE_SIZE = parsePageSize(import.meta.env.VITE_DETAIL_PAGE_SIZE);

const EMPTY_SELECTION: SelectionResult = { masterRowIds: [], detailRowIds: [] };

interface AppProps {
  dataUrl?: string;
}

const AppContent = memo<AppProps>(({ dataUrl = DATA_URL }) => {
  const { config, source, loading, error, reload } = useGridData(dataUrl);
  const [selection, setSelection] = useState<SelectionResult>(EMPTY_SELECTION);

  if (loading) {
    return (
      <div className="flex items-center gap-2 text-gray-600 py-8">
        <Loader2 className="w-5 h-5 animate-spin" />
        Loading data...
      </div>
    );
  }

  if (error || !config) {
    return (
      <div role="alert" className="bg-red-50 border border-red-200 rounded-lg p-4">
        <div className="flex items-center gap-2 text-red-800 font-medium">
          <AlertCircle className="w-5 h-5" />
          {error ? `${error.name}: ${error.message}` : 'No data loaded'}
        </div>
        <button
          onClick={reload}
          className="mt-3 px-3 py-1 border border-red-300 rounded text-sm text-red-800 hover:bg-red-100"
        >
          Retry
        </button>
      </div>
    );
  }

  return (
    <>
      <GridTabs
        tabs={[
          {
            id: 'grid',
            label: 'Grid',
            icon: Table,
            content: (
              <MasterDetailGrid
                config={config}
                detailPageSize={DETAIL_PAGE_SIZE}
                onSelectionChange={setSelection}
              />
            ),
          },
          {
            id: 'data',
            label: 'Underlying Data',
            icon: Database,
            content: <JsonView label="Underlying Data" value={JSON.stringify(source, null, 2)} />,
          },
          {
            id: 'options',
            label: 'Grid Options',
            icon: Settings,
            content: <JsonView label="Grid Options" value={serializeConfig(config)} />,
          },
          {
            id: 'return',
            label: 'Grid Return',
            icon: MousePointerClick,
            content: <JsonView label="Grid Return" value={JSON.stringify(selection, null, 2)} />,
          },
        ]}
      />

      <p className="mt-4 text-sm text-gray-700">
        Selected Rows ID: <span data-testid="selected-rows">{JSON.stringify(selection.masterRowIds)}</span>
      </p>
    </>
  );
});

AppContent.displayName = 'AppContent';

function App({ dataUrl }: AppProps) {
  return (
    <div className="min-h-screen bg-gray-100">
      <div className="container mx-auto p-4 max-w-7xl">
        <h1 className="text-2xl font-semibold mb-4">Master-Detail Grid Example</h1>
        <ErrorBoundary>
          <AppContent dataUrl={dataUrl} />
        </ErrorBoundary>
      </div>
    </div>
  );
}

export default App;
