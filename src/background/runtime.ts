import { EventEmitter } from 'node:events';

import { errorMessage } from './errors';

export interface RuntimeMessage {
  type: string;
  payload?: unknown;
}

export interface BroadcastMessage {
  type: string;
  data?: unknown;
  error?: string;
}

export interface FailureResponse {
  success: false;
  error: string;
  errorType: string;
}

export type MessageResponse<T = unknown> = { success: true; data: T } | FailureResponse;

export type SendResponse = (response: MessageResponse) => void;

/**
 * Return true to claim the message; `sendResponse` may then be called later.
 */
export type MessageListener = (message: RuntimeMessage, sendResponse: SendResponse) => boolean | void;

export type BroadcastListener = (message: BroadcastMessage) => void;

export interface Runtime {
  sendMessage(message: RuntimeMessage): Promise<MessageResponse>;
  onMessage: {
    addListener(listener: MessageListener): void;
    removeListener(listener: MessageListener): void;
  };
  broadcast(message: BroadcastMessage): void;
  onBroadcast: {
    addListener(listener: BroadcastListener): void;
    removeListener(listener: BroadcastListener): void;
  };
}

const BROADCAST_EVENT = 'broadcast';

export const failureResponse = (error: unknown): FailureResponse => ({
  success: false,
  error: errorMessage(error),
  errorType: error instanceof Error ? error.name : 'Error',
});

/**
 * In-process message bus with request/response messages and fire-and-forget
 * broadcasts, shaped after the extension runtime messaging API.
 */
export const createRuntime = (): Runtime => {
  const messageListeners = new Set<MessageListener>();
  const emitter = new EventEmitter();

  return {
    sendMessage: message => new Promise<MessageResponse>(resolve => {
      let responded = false;
      const sendResponse: SendResponse = response => {
        if (!responded) {
          responded = true;
          resolve(response);
        }
      };

      for (const listener of [...messageListeners]) {
        try {
          if (listener(message, sendResponse) === true || responded) {
            return;
          }
        } catch (error) {
          console.error(`[Background] Listener for '${message.type}' threw:`, error);
          sendResponse(failureResponse(error));

          return;
        }
      }

      sendResponse({
        success: false,
        error: `No handler for message type '${message.type}'.`,
        errorType: 'InvalidRequestError',
      });
    }),

    onMessage: {
      addListener: listener => {
        messageListeners.add(listener);
      },
      removeListener: listener => {
        messageListeners.delete(listener);
      },
    },

    broadcast: message => {
      emitter.emit(BROADCAST_EVENT, message);
    },

    onBroadcast: {
      addListener: listener => {
        emitter.on(BROADCAST_EVENT, listener);
      },
      removeListener: listener => {
        emitter.off(BROADCAST_EVENT, listener);
      },
    },
  };
};
