import type { FlashMessage } from '../../domain/types.js';

interface FlashMessagesProps {
  messages: FlashMessage[];
}

export function FlashMessages({ messages }: FlashMessagesProps) {
  if (messages.length === 0) return null;

  return (
    <div className="flash-list" role="status">
      {messages.map((m, i) => (
        <p key={i} className={`flash flash-${m.level}`}>
          {m.text}
        </p>
      ))}
    </div>
  );
}
