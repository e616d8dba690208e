import { Routes, Route, Navigate } from 'react-router-dom';
import { TrackServerProvider } from './providers/TrackServerProvider.js';
import { Editor } from './pages/Editor.js';
import { Preview } from './pages/Preview.js';

export function App() {
  return (
    <TrackServerProvider>
      <Routes>
        <Route path="/" element={<Editor />} />
        <Route path="/preview" element={<Preview />} />
        <Route path="*" element={<Navigate to="/" replace />} />
      </Routes>
    </TrackServerProvider>
  );
}
