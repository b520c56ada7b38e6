'use client';

import React from 'react';
import Header from '@/components/Header';
import VideoForm from '@/components/VideoForm';
import StatusPanel from '@/components/StatusPanel';
import ChatInterface from '@/components/ChatInterface';
import { useSessionController } from '@/hooks/useSessionController';

export default function Home() {
  const { controller, snapshot } = useSessionController();
  const { view, currentVideoId } = snapshot;

  return (
    <div className="fixed inset-0 flex flex-col bg-[#131314] overflow-hidden text-[#e3e3e3]">
      <Header showNewChat={view !== 'video'} onNewChat={() => controller.resetSession()} />
      <main className="flex-1 min-h-0">
        {view === 'video' && (
          <VideoForm
            error={snapshot.error}
            isProcessing={snapshot.isProcessing}
            onSubmit={(url) => void controller.processVideo(url)}
            onDismissError={() => controller.dismissError()}
          />
        )}
        {view === 'status' && <StatusPanel statusText={snapshot.statusText} />}
        {view === 'chat' && currentVideoId !== null && (
          <ChatInterface
            videoId={currentVideoId}
            messages={snapshot.messages}
            isLoading={snapshot.isProcessing}
            onSendMessage={(text) => void controller.sendMessage(text)}
          />
        )}
      </main>
    </div>
  );
}
