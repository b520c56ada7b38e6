import React, { useState, useRef, useEffect } from 'react';
import { Send, Sparkles } from 'lucide-react';
import Message from './Message';
import type { DisplayMessage } from '@/types/chat';

interface ChatInterfaceProps {
  videoId: string;
  messages: readonly DisplayMessage[];
  isLoading: boolean;
  onSendMessage: (text: string) => void;
}

const ChatInterface: React.FC<ChatInterfaceProps> = ({
  videoId,
  messages,
  isLoading,
  onSendMessage,
}) => {
  const [input, setInput] = useState('');
  const scrollContainerRef = useRef<HTMLDivElement>(null);
  const textareaRef = useRef<HTMLTextAreaElement>(null);
  const prevMessagesLength = useRef(messages.length);
  const isUserAtBottomRef = useRef(true); // Track if user is at bottom

  const handleScroll = () => {
    const container = scrollContainerRef.current;
    if (!container) return;

    const { scrollTop, scrollHeight, clientHeight } = container;
    isUserAtBottomRef.current = scrollHeight - scrollTop - clientHeight < 200;
  };

  useEffect(() => {
    const container = scrollContainerRef.current;
    if (!container) return;

    const isNewMessage = messages.length > prevMessagesLength.current;
    prevMessagesLength.current = messages.length;

    // New message: always snap to bottom. Typing indicator: only if already there.
    if (isNewMessage) isUserAtBottomRef.current = true;
    if (isUserAtBottomRef.current) {
      requestAnimationFrame(() => {
        container.scrollTop = container.scrollHeight;
      });
    }
  }, [messages, isLoading]);

  // Auto-resize textarea
  useEffect(() => {
    const textarea = textareaRef.current;
    if (!textarea) return;
    textarea.style.height = 'auto';
    if (input !== '') {
      textarea.style.height = `${textarea.scrollHeight}px`;
    }
  }, [input]);

  const canSend = input.trim().length > 0 && !isLoading;

  const handleSend = () => {
    if (!canSend) return;
    onSendMessage(input);
    setInput('');
  };

  const handleKeyDown = (e: React.KeyboardEvent<HTMLTextAreaElement>) => {
    if (e.key === 'Enter' && !e.shiftKey) {
      e.preventDefault(); // Prevent newline
      handleSend();
    }
  };

  return (
    <div className="flex flex-col h-full bg-[#131314]">
      <div
        ref={scrollContainerRef}
        onScroll={handleScroll}
        className="flex-1 overflow-y-auto pt-8 pb-40"
      >
        <div className="flex flex-col gap-6">
          <div className="w-full max-w-4xl mx-auto px-4">
            <div className="aspect-video w-full max-w-xl mx-auto overflow-hidden rounded-2xl border border-[#444746]">
              <iframe
                title="Loaded video"
                src={`https://www.youtube.com/embed/${encodeURIComponent(videoId)}`}
                className="w-full h-full"
                allow="accelerometer; clipboard-write; encrypted-media; picture-in-picture"
                allowFullScreen
              />
            </div>
          </div>

          <Message
            role="model"
            content={"**Video Loaded!**  \nI've analyzed the transcript. You can now ask me anything about this video."}
          />

          {messages.map((msg, idx) => (
            <Message key={idx} role={msg.role} content={msg.content} isError={msg.isError} />
          ))}

          {isLoading && (
            <div className="flex gap-4 w-full max-w-4xl mx-auto px-4">
              <div className="w-8 h-8 rounded-full bg-gradient-to-tr from-blue-500 to-purple-500 flex items-center justify-center animate-pulse">
                <Sparkles className="w-4 h-4 text-white" />
              </div>
              <div className="flex items-center">
                <span className="text-gray-400 animate-pulse">Thinking...</span>
              </div>
            </div>
          )}
        </div>
      </div>

      <div className="fixed bottom-0 left-0 right-0 p-4 bg-[#131314]">
        <div className="max-w-4xl mx-auto">
          <div className="bg-[#1e1f20] rounded-3xl p-2 flex items-end gap-2 border border-[#444746]">
            <textarea
              ref={textareaRef}
              rows={1}
              value={input}
              onChange={(e) => setInput(e.target.value)}
              onKeyDown={handleKeyDown}
              placeholder="Ask something about this video"
              aria-label="Question"
              className="flex-1 resize-none bg-transparent border-none outline-none text-[#e3e3e3] placeholder-gray-500 p-2 max-h-48"
            />
            <button
              type="button"
              onClick={handleSend}
              disabled={!canSend}
              aria-label="Send"
              className={`p-2 rounded-full transition-colors ${
                canSend ? 'bg-white text-black hover:bg-gray-200' : 'bg-[#333537] text-gray-500'
              }`}
            >
              <Send className="w-5 h-5" />
            </button>
          </div>
          <p className="text-xs text-center text-gray-500 mt-2">
            Answers come from the video transcript and may be incomplete, so double-check important details.
          </p>
        </div>
      </div>
    </div>
  );
};

export default ChatInterface;
