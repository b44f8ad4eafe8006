import React from 'react';
import type { CardSnapshot, GameSnapshot } from '@memory-match/shared';
import { GRID_COLUMNS, MemoryMatchSession, silentLogger } from '@memory-match/engine';
import { config } from './config';
import { useMemoryMatch } from './useMemoryMatch';
import './styles.css';

interface AppProps {
  session?: MemoryMatchSession;
}

const createSession = () => new MemoryMatchSession({ logger: config.debugEngine ? console : silentLogger });

function cardLabel(card: CardSnapshot, position: number): string {
  if (card.matched) {
    return `Card ${position + 1}: ${card.content}, matched`;
  }

  return card.faceUp ? `Card ${position + 1}: ${card.content}` : `Card ${position + 1}: hidden`;
}

export function App({ session: providedSession }: AppProps) {
  const [session] = React.useState(() => providedSession ?? createSession());
  const snapshot = useMemoryMatch(session);

  React.useEffect(() => () => session.dispose(), [session]);

  const renderCard = (card: CardSnapshot, position: number) => {
    const revealed = card.faceUp || card.matched;
    return (
      <button
        key={`${card.round}:${card.id}`}
        className={`memory-card ${revealed ? 'memory-card-revealed' : ''} ${card.matched ? 'memory-card-matched' : ''}`}
        aria-label={cardLabel(card, position)}
        disabled={card.matched}
        onClick={() => session.flip(card)}
      >
        {revealed ? card.content : '?'}
      </button>
    );
  };

  const renderHud = (state: GameSnapshot) => (
    <div className="chip-row">
      <span className="chip">Time: {state.elapsedSeconds}s</span>
      <span className="chip chip-highlight">Score: {state.score}</span>
      <button className="btn" onClick={session.reset}>
        Reset
      </button>
    </div>
  );

  const renderWinPanel = (state: GameSnapshot) => (
    <section className="card stack-lg" role="dialog" aria-label="Game finished">
      <h2>You won!</h2>
      <p className="subtle">
        Time: {state.elapsedSeconds}s · Score: {state.score}
      </p>
      <button className="btn btn-primary" onClick={session.reset}>
        Play Again
      </button>
    </section>
  );

  return (
    <main className="app-shell">
      <section className="card stack-lg">
        <h1>Memory Match</h1>
        {renderHud(snapshot)}
        <div className="memory-grid" style={{ gridTemplateColumns: `repeat(${GRID_COLUMNS}, minmax(0, 1fr))` }}>
          {snapshot.cards.map(renderCard)}
        </div>
      </section>
      {snapshot.finished ? renderWinPanel(snapshot) : null}
    </main>
  );
}
