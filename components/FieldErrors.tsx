import type { FieldError } from '@/lib/errors';

type FieldErrorsProps = {
  errors: FieldError[];
};

export default function FieldErrors({ errors }: FieldErrorsProps) {
  if (errors.length === 0) return null;

  return (
    <ul className="mt-3 rounded-lg border border-rose-200 bg-rose-50 px-4 py-3 text-sm text-rose-700 space-y-1">
      {errors.map((error) => (
        <li key={`${error.field}:${error.message}`}>
          <span className="font-semibold">{error.field.replace(/_/g, ' ')}</span>: {error.message}
        </li>
      ))}
    </ul>
  );
}
