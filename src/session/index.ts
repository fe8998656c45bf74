export { Conversations } from './conversations'
export { KeyedQueue } from './queue'
export { type ChatId, SessionStore } from './store'
