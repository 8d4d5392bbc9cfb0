import { TranscriberApp } from './components/TranscriberApp';
import { AppStateProvider } from './context/AppStateContext';

function App() {
  return (
    <AppStateProvider>
      <main className="min-h-screen bg-gray-100 text-gray-900">
        <TranscriberApp />
      </main>
    </AppStateProvider>
  );
}

export default App;
