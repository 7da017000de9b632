import Link from 'next/link';
import type { BoardView } from '@/src/lib/meal-days/mealDays.views';
import { DayCard } from './DayCard';

function BoardStats({ view }: { view: BoardView }) {
  const { page } = view;
  if (!page.showDaysUntilPayday && !page.showDaysEatingOut) return null;

  return (
    <dl className="stats">
      {page.showDaysUntilPayday && view.daysUntilPayday !== null && (
        <div>
          <dt>Days until payday</dt>
          <dd>
            {view.daysUntilPayday} ({view.nextPaydayDate})
          </dd>
        </div>
      )}
      {page.showDaysEatingOut && view.takeoutCount !== null && (
        <div>
          <dt>Takeout in the last week</dt>
          <dd>{view.takeoutCount}</dd>
        </div>
      )}
    </dl>
  );
}

export function DayBoard({ view }: { view: BoardView }) {
  const { page } = view;
  const cards = view.days.map((day, index) => (
    <DayCard key={day.date} day={day} index={index} readOnly={page.daysAreStale} />
  ));

  return (
    <main className="board">
      <header className="board__header">
        <h1>{page.title}</h1>
        <nav>
          {page.daysAreStale ? (
            <Link href="/">Upcoming</Link>
          ) : (
            <Link href="/backwards">Past meals</Link>
          )}
        </nav>
      </header>
      {view.error && (
        <p role="alert" className="board__error">
          {view.error}
        </p>
      )}
      <BoardStats view={view} />
      {page.daysAreStale ? (
        <div className="board__days">{cards}</div>
      ) : (
        <form method="post" action="/update">
          <div className="board__days">{cards}</div>
          <button type="submit">Save</button>
        </form>
      )}
    </main>
  );
}
