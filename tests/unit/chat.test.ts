import { chatMessageSchema, webConversationId } from '../../src/routes/chat.routes';
import { AUTHOR_ID_MAX_LENGTH } from '../../src/types/agent';

describe('Web chat channel', () => {
  it('keeps the longest accepted conversation id within the author column', () => {
    const id = 'a'.repeat(AUTHOR_ID_MAX_LENGTH - 'web:'.length);

    const parsed = chatMessageSchema.safeParse({ conversation_id: id, message: 'hello' });

    expect(parsed.success).toBe(true);
    expect(webConversationId(id)).toHaveLength(AUTHOR_ID_MAX_LENGTH);
  });

  it('rejects a conversation id that would not fit once prefixed', () => {
    const parsed = chatMessageSchema.safeParse({
      conversation_id: 'a'.repeat(AUTHOR_ID_MAX_LENGTH - 'web:'.length + 1),
      message: 'hello',
    });

    expect(parsed.success).toBe(false);
  });

  it('defaults the display name', () => {
    const parsed = chatMessageSchema.parse({ conversation_id: 'demo', message: 'hello' });

    expect(parsed.display_name).toBe('Guest');
    expect(webConversationId(parsed.conversation_id)).toBe('web:demo');
  });
});
