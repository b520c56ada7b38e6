import React from 'react';
import { Loader2 } from 'lucide-react';

interface StatusPanelProps {
  statusText: string;
}

const StatusPanel: React.FC<StatusPanelProps> = ({ statusText }) => (
  <div role="status" className="flex flex-col items-center justify-center h-full gap-4 p-8 text-[#e3e3e3]">
    <Loader2 className="w-10 h-10 text-blue-400 animate-spin" />
    <p className="text-gray-400">{statusText || 'Processing video...'}</p>
  </div>
);

export default StatusPanel;
