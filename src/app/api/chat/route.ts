import { NextResponse } from 'next/server';
import { forwardToBackend } from '@/lib/backend';

export async function POST(req: Request) {
  try {
    const result = await forwardToBackend('/chat', await req.text());
    return new NextResponse(result.body, {
      status: result.status,
      headers: { 'Content-Type': result.contentType },
    });
  } catch (error) {
    console.error('Error forwarding chat request:', error);
    return NextResponse.json({ detail: 'Internal Server Error' }, { status: 500 });
  }
}
