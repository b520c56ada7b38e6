import React from 'react';
import { Plus, Youtube } from 'lucide-react';

interface HeaderProps {
  showNewChat: boolean;
  onNewChat: () => void;
}

const Header: React.FC<HeaderProps> = ({ showNewChat, onNewChat }) => {
  return (
    <header className="sticky top-0 z-50 flex items-center justify-between px-4 py-3 bg-[#1e1f20] text-[#e3e3e3]">
      <div className="flex items-center gap-2">
        <Youtube className="w-6 h-6 text-red-500" />
        <span className="text-lg font-medium">Video Chat</span>
      </div>
      {showNewChat && (
        <button
          onClick={onNewChat}
          className="flex items-center gap-2 px-4 py-2 rounded-full bg-[#1a1a1c] hover:bg-[#333537] transition-colors"
        >
          <Plus className="w-4 h-4 text-gray-400" />
          <span className="text-sm font-medium">New chat</span>
        </button>
      )}
    </header>
  );
};

export default Header;
