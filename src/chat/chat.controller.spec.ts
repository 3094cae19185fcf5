import { BadRequestException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { ChatController } from './chat.controller';
import { ChatService } from './chat.service';
import { InboundMessage, TurnResult } from './chat.types';

describe('ChatController', () => {
  let handleMessage: jest.Mock<Promise<TurnResult>, [InboundMessage]>;
  let clearHistory: jest.Mock<void, [string]>;
  let controller: ChatController;

  beforeEach(async () => {
    handleMessage = jest.fn().mockResolvedValue({ replied: true, chunks: ['Hi'], usedMemory: false });
    clearHistory = jest.fn();
    const moduleRef = await Test.createTestingModule({
      controllers: [ChatController],
      providers: [{ provide: ChatService, useValue: { handleMessage, clearHistory } }],
    }).compile();
    controller = moduleRef.get(ChatController);
  });

  it('hands a valid message to the chat service with defaults applied', async () => {
    const result = await controller.handleMessage({
      channelId: 'c1',
      authorId: 'u1',
      authorName: 'Sam',
      content: 'hello',
      referenced: { authorName: 'Alex', content: 'earlier' },
    });

    expect(result).toEqual({ replied: true, chunks: ['Hi'], usedMemory: false });
    expect(handleMessage).toHaveBeenCalledWith({
      channelId: 'c1',
      authorId: 'u1',
      authorName: 'Sam',
      content: 'hello',
      mentionsBot: true,
      referenced: { authorName: 'Alex', content: 'earlier', fromBot: false },
    });
  });

  it('rejects a message without content', async () => {
    const call = controller.handleMessage({ channelId: 'c1', authorId: 'u1', authorName: 'Sam', content: '' });

    await expect(call).rejects.toBeInstanceOf(BadRequestException);
    expect(handleMessage).not.toHaveBeenCalled();
  });

  it('rejects a body that is not an object', async () => {
    await expect(controller.handleMessage('hello')).rejects.toBeInstanceOf(BadRequestException);
  });

  it('clears the channel history', () => {
    controller.clearHistory('c1');

    expect(clearHistory).toHaveBeenCalledWith('c1');
  });
});
