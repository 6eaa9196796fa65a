/**
 * greetd IPC message types
 *
 * Requests and responses are JSON objects tagged by `type`, field names as
 * they appear on the wire.
 */

export type GreetdRequest =
  | { type: 'create_session'; username: string }
  | { type: 'post_auth_message_response'; response: string | null }
  | { type: 'start_session'; cmd: string[]; env: string[] }
  | { type: 'cancel_session' };

export type AuthMessageType = 'visible' | 'secret' | 'info' | 'error';

export type GreetdErrorType = 'auth_error' | 'error';

export type GreetdResponse =
  | { type: 'success' }
  | { type: 'auth_message'; auth_message_type: AuthMessageType; auth_message: string }
  | { type: 'error'; error_type: GreetdErrorType; description: string };

/**
 * One step of an authentication conversation, as seen by the login
 * controller. Exactly one per request.
 */
export type AuthExchange =
  | { kind: 'prompt-secret'; prompt: string }
  | { kind: 'prompt-visible'; prompt: string }
  | { kind: 'info'; text: string }
  | { kind: 'error'; text: string }
  | { kind: 'success' };
