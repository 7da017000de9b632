import clsx from 'clsx';
import type { BoardDayView, BoardMealView } from '@/src/lib/meal-days/mealDays.views';

/**
 * Checkbox posted as `on`/`off`: the hidden input is always sent and the
 * checkbox value, when ticked, overrides it.
 */
function FlagField({
  name,
  label,
  checked,
  disabled,
}: {
  name: string;
  label: string;
  checked: boolean;
  disabled: boolean;
}) {
  return (
    <label className={clsx('flag', checked && 'flag--on')}>
      {!disabled && <input type="hidden" name={name} value="off" />}
      <input
        type="checkbox"
        name={name}
        value="on"
        defaultChecked={checked}
        disabled={disabled}
      />
      {label}
    </label>
  );
}

function MealFields({
  prefix,
  meal,
  disabled,
}: {
  prefix: string;
  meal: BoardMealView;
  disabled: boolean;
}) {
  const fields = `${prefix}[meals][${meal.type}]`;
  return (
    <div className={clsx('meal', meal.isTakeout && 'meal--takeout')}>
      <span className="meal__label">{meal.label}</span>
      <input
        type="text"
        name={`${prefix}[${meal.type}]`}
        defaultValue={meal.description}
        disabled={disabled}
        aria-label={`${meal.label} description`}
      />
      <input
        type="text"
        name={`${fields}[cooking_user]`}
        defaultValue={meal.cookingUser}
        disabled={disabled}
        placeholder="Cook"
        maxLength={64}
        aria-label={`${meal.label} cook`}
      />
      <FlagField
        name={`${fields}[is_takeout]`}
        label="Takeout"
        checked={meal.isTakeout}
        disabled={disabled}
      />
      <FlagField
        name={`${fields}[is_favorite]`}
        label="Favorite"
        checked={meal.isFavorite}
        disabled={disabled}
      />
    </div>
  );
}

export function DayCard({
  day,
  index,
  readOnly,
}: {
  day: BoardDayView;
  index: number;
  readOnly: boolean;
}) {
  const prefix = `days[${index}]`;
  return (
    <section
      className={clsx(
        'day',
        day.isToday && 'day--today',
        day.isStarred && 'day--starred',
        readOnly && 'day--stale',
      )}
    >
      <header className="day__header">
        <h2>{day.weekday}</h2>
        <span>{day.shortDate}</span>
      </header>
      {!readOnly && (
        <>
          {day.id !== null && <input type="hidden" name={`${prefix}[id]`} value={day.id} />}
          <input type="hidden" name={`${prefix}[date]`} value={day.date} />
        </>
      )}
      <div className="day__flags">
        <FlagField
          name={`${prefix}[is_starred]`}
          label="Starred"
          checked={day.isStarred}
          disabled={readOnly}
        />
        <FlagField
          name={`${prefix}[is_sammy_working]`}
          label="Sammy working"
          checked={day.isSammyWorking}
          disabled={readOnly}
        />
      </div>
      {day.meals.map((meal) => (
        <MealFields key={meal.type} prefix={prefix} meal={meal} disabled={readOnly} />
      ))}
    </section>
  );
}
