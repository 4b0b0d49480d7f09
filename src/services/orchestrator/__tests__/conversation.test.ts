import { describe, it, expect } from 'vitest';
import { Conversation } from '../conversation.js';
import { ConversationInvariantError } from '../../../utils/errors.js';

const weatherRequest = {
  kind: 'tool_request' as const,
  content: '',
  toolCalls: [
    { id: 'call_1', name: 'get_weather', arguments: { location: 'San Francisco' } },
    { id: 'call_2', name: 'get_weather', arguments: { location: 'Oakland' } },
  ],
};

describe('Conversation', () => {
  it('seeds with an optional system message followed by the task', () => {
    const withSystem = new Conversation('What is the weather?', 'Convert temperatures to Celsius');
    expect(withSystem.messages).toEqual([
      { role: 'system', content: 'Convert temperatures to Celsius' },
      { role: 'user', content: 'What is the weather?' },
    ]);

    const withoutSystem = new Conversation('What is the weather?');
    expect(withoutSystem.length).toBe(1);
    expect(withoutSystem.messages[0]).toEqual({ role: 'user', content: 'What is the weather?' });
  });

  it('ignores a blank system instruction', () => {
    expect(new Conversation('task', '   ').length).toBe(1);
  });

  it('tracks tool calls until each result is appended in order', () => {
    const conversation = new Conversation('task');
    conversation.appendAssistant(weatherRequest);

    expect(conversation.pendingToolCalls().map(c => c.id)).toEqual(['call_1', 'call_2']);

    conversation.appendToolResult('call_1', 'get_weather', '{"temperature":18}');
    expect(conversation.hasPendingToolCalls()).toBe(true);

    conversation.appendToolResult('call_2', 'get_weather', '{"temperature":20}');
    expect(conversation.hasPendingToolCalls()).toBe(false);

    expect(conversation.messages.slice(2)).toEqual([
      { role: 'tool', content: '{"temperature":18}', tool_call_id: 'call_1', name: 'get_weather' },
      { role: 'tool', content: '{"temperature":20}', tool_call_id: 'call_2', name: 'get_weather' },
    ]);
  });

  it('rejects results out of request order', () => {
    const conversation = new Conversation('task');
    conversation.appendAssistant(weatherRequest);

    expect(() => conversation.appendToolResult('call_2', 'get_weather', '{}')).toThrow(
      'Tool result "call_2" is out of order; expected result for "call_1"',
    );
  });

  it('rejects a result with no matching call', () => {
    const conversation = new Conversation('task');
    expect(() => conversation.appendToolResult('call_9', 'get_weather', '{}')).toThrow(ConversationInvariantError);
  });

  it('refuses a new assistant message while results are outstanding', () => {
    const conversation = new Conversation('task');
    conversation.appendAssistant(weatherRequest);
    conversation.appendToolResult('call_1', 'get_weather', '{}');

    expect(() => conversation.appendAssistant({ kind: 'final', content: 'done' })).toThrow(ConversationInvariantError);
  });

  it('refuses tool call ids that were already resolved', () => {
    const conversation = new Conversation('task');
    conversation.appendAssistant(weatherRequest);
    conversation.appendToolResult('call_1', 'get_weather', '{}');
    conversation.appendToolResult('call_2', 'get_weather', '{}');

    expect(() =>
      conversation.appendAssistant({
        kind: 'tool_request',
        content: '',
        toolCalls: [{ id: 'call_1', name: 'get_weather', arguments: {} }],
      }),
    ).toThrow('Tool call id "call_1" was already used in this conversation');
  });

  it('keeps accompanying content on tool-request messages', () => {
    const conversation = new Conversation('task');
    const message = conversation.appendAssistant({ ...weatherRequest, content: 'Let me check both cities.' });

    expect(message.content).toBe('Let me check both cities.');
    expect(message.tool_calls?.length).toBe(2);
  });

  it('hands out copies that do not alias the log', () => {
    const conversation = new Conversation('task');
    conversation.appendAssistant(weatherRequest);

    const copy = conversation.snapshot();
    copy.push({ role: 'user', content: 'injected' });
    const assistant = copy[1];
    if (assistant.role === 'assistant' && assistant.tool_calls) {
      assistant.tool_calls[0].arguments.location = 'Mars';
    }

    expect(conversation.length).toBe(2);
    expect(conversation.pendingToolCalls()[0].arguments.location).toBe('San Francisco');
    expect(conversation.since(1)).toHaveLength(1);
  });
});
