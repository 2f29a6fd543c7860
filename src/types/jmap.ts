/**
 * TypeScript types for JMAP protocol (RFC 8620/8621)
 */

/** Any value that survives a JSON round trip */
export type JSONValue = null | boolean | number | string | JSONValue[] | { [key: string]: JSONValue };

/** Method arguments and response arguments are always JSON objects */
export type JMAPArguments = Record<string, unknown>;

/**
 * JMAP method call on the wire: [methodName, arguments, callId]
 * Example: ['Mailbox/get', { accountId: '...', ids: ['mb1'] }, 'c0']
 */
export type JMAPMethodCall = [methodName: string, args: JMAPArguments, callId: string];

/**
 * JMAP method response on the wire: [methodName, response, callId]
 * Example: ['Mailbox/get', { accountId: '...', list: [...], state: '...' }, 'c0']
 */
export type JMAPMethodResponse = [methodName: string, response: JMAPArguments, callId: string];

/** JMAP request body */
export interface JMAPRequest {
  using: string[];
  methodCalls: JMAPMethodCall[];
}

/** One call of a batch, with its call id settled */
export interface MethodCall {
  readonly name: string;
  readonly arguments: Readonly<JMAPArguments>;
  readonly callId: string;
}

/** One response of a batch, echoing the call id of the call it answers */
export interface MethodResponse {
  readonly name: string;
  readonly arguments: Readonly<JMAPArguments>;
  readonly callId: string;
}

/** JMAP SetError (RFC 8620 Section 5.3) */
export interface SetError {
  type: string;
  description?: string;
  properties?: string[];
}

/** JMAP Mailbox rights (RFC 8621 Section 2) */
export interface MailboxRights {
  mayReadItems: boolean;
  mayAddItems: boolean;
  mayRemoveItems: boolean;
  maySetSeen: boolean;
  maySetKeywords: boolean;
  mayCreateChild: boolean;
  mayRename: boolean;
  mayDelete: boolean;
  maySubmit: boolean;
}

/** JMAP Mailbox (RFC 8621 Section 2) */
export interface Mailbox {
  id: string;
  name: string;
  parentId: string | null;
  role: string | null;
  sortOrder: number;
  totalEmails: number;
  unreadEmails: number;
  totalThreads: number;
  unreadThreads: number;
  myRights: MailboxRights;
  isSubscribed: boolean;
}
