import React, { useState } from 'react';
import { Link2, X } from 'lucide-react';

interface VideoFormProps {
  error: string | null;
  isProcessing: boolean;
  onSubmit: (url: string) => void;
  onDismissError: () => void;
}

const VideoForm: React.FC<VideoFormProps> = ({ error, isProcessing, onSubmit, onDismissError }) => {
  const [url, setUrl] = useState('');

  const handleSubmit = (e: React.FormEvent) => {
    e.preventDefault();
    onSubmit(url);
  };

  return (
    <div className="flex flex-col items-center justify-center h-full p-8 text-[#e3e3e3]">
      <h1 className="text-4xl font-medium mb-2 bg-gradient-to-r from-red-400 to-purple-400 text-transparent bg-clip-text">
        Chat with any video
      </h1>
      <p className="text-lg text-gray-500 mb-8">Paste a YouTube link and ask questions about its transcript.</p>

      <form onSubmit={handleSubmit} className="w-full max-w-2xl">
        <div className="bg-[#1e1f20] rounded-3xl p-2 flex items-center gap-2 border border-[#444746]">
          <Link2 className="w-5 h-5 ml-2 text-gray-400" />
          <input
            type="text"
            value={url}
            onChange={(e) => setUrl(e.target.value)}
            placeholder="https://www.youtube.com/watch?v=..."
            aria-label="YouTube URL"
            className="flex-1 bg-transparent border-none outline-none text-[#e3e3e3] placeholder-gray-500 p-2"
            disabled={isProcessing}
          />
          <button
            type="submit"
            disabled={isProcessing}
            className="px-5 py-2 rounded-full bg-white text-black hover:bg-gray-200 disabled:bg-[#333537] disabled:text-gray-500 transition-colors"
          >
            Analyze
          </button>
        </div>
      </form>

      {error && (
        <div role="alert" className="mt-6 w-full max-w-2xl flex items-start gap-3 rounded-2xl border border-red-500/40 bg-red-500/10 p-4">
          <p className="flex-1 text-sm text-red-300 break-words">{error}</p>
          <button
            onClick={onDismissError}
            aria-label="Dismiss error"
            className="p-1 text-red-300 hover:text-white transition-colors"
          >
            <X className="w-4 h-4" />
          </button>
        </div>
      )}
    </div>
  );
};

export default VideoForm;
