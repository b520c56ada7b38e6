import React, { useMemo } from 'react';
import { marked } from 'marked';
import { AlertTriangle, Sparkles, User } from 'lucide-react';
import type { ChatRole } from '@/types/chat';

interface MessageProps {
  role: ChatRole;
  content: string;
  isError?: boolean;
}

export function renderMarkdown(content: string) {
  return marked.parse(content, { async: false });
}

const Message: React.FC<MessageProps> = ({ role, content, isError = false }) => {
  const isUser = role === 'user';
  // Model replies are Markdown; user input is always shown as typed.
  const html = useMemo(() => (isUser ? '' : renderMarkdown(content)), [isUser, content]);

  return (
    <div
      data-role={role}
      className={`flex gap-4 w-full max-w-4xl mx-auto px-4 ${isUser ? 'justify-end' : 'justify-start'}`}
    >
      {!isUser && (
        <div
          className={`w-8 h-8 flex-shrink-0 rounded-full flex items-center justify-center ${
            isError ? 'bg-red-500/80' : 'bg-gradient-to-tr from-blue-500 to-purple-500'
          }`}
        >
          {isError ? <AlertTriangle className="w-4 h-4 text-white" /> : <Sparkles className="w-4 h-4 text-white" />}
        </div>
      )}
      {isUser ? (
        <div className="message-content max-w-[80%] rounded-3xl bg-[#2f2f31] px-5 py-3 whitespace-pre-wrap break-words">
          {content}
        </div>
      ) : (
        <div
          className={`message-content max-w-[80%] break-words ${isError ? 'text-red-300' : ''}`}
          dangerouslySetInnerHTML={{ __html: html }}
        />
      )}
      {isUser && (
        <div className="w-8 h-8 flex-shrink-0 rounded-full bg-[#333537] flex items-center justify-center">
          <User className="w-4 h-4 text-gray-300" />
        </div>
      )}
    </div>
  );
};

export default Message;
