import assert from 'node:assert/strict';
import test from 'node:test';
import { AppError, DuplicateRecordError, ProtectedRecordError } from '../lib/errors';
import { toStoreError } from '../lib/store/supabase-store';

test('unique violations on an expression index name the field behind it', () => {
  const error = toStoreError(
    {
      code: '23505',
      message: 'duplicate key value violates unique constraint "idx_categories_name"',
      details: 'Key (lower(name))=(dairy) already exists.',
    },
    'categories.insert'
  );

  assert.ok(error instanceof DuplicateRecordError);
  assert.equal(error.status, 400);
  assert.deepEqual(error.fieldErrors, [{ field: 'name', message: 'Another record already uses this name.' }]);
});

test('unique violations on a plain column take the field from the details', () => {
  const error = toStoreError(
    {
      code: '23505',
      message: 'duplicate key value violates unique constraint "customers_phone_key"',
      details: 'Key (phone)=(98450) already exists.',
    },
    'customers.insert'
  );

  assert.ok(error instanceof DuplicateRecordError);
  assert.deepEqual(error.fieldErrors, [{ field: 'phone', message: 'Another record already uses this phone.' }]);
});

test('a bare unique violation falls back to the form', () => {
  const error = toStoreError({ code: '23505', message: 'duplicate key' }, 'categories.insert');

  assert.ok(error instanceof DuplicateRecordError);
  assert.deepEqual(error.fieldErrors, [{ field: 'form', message: 'A record with the same value already exists.' }]);
});

test('foreign key violations protect the record with a 409', () => {
  const error = toStoreError(
    { code: '23503', message: 'update or delete on table "products" violates foreign key constraint' },
    'products.delete'
  );

  assert.ok(error instanceof ProtectedRecordError);
  assert.equal(error.status, 409);
  assert.equal(error.code, 'PROTECTED_RECORD');
});

test('other database errors stay server errors carrying the operation', () => {
  const error = toStoreError({ code: '42P01', message: 'relation "products" does not exist' }, 'products.list');

  assert.ok(!(error instanceof DuplicateRecordError));
  assert.ok(error instanceof AppError);
  assert.equal(error.status, 500);
  assert.equal(error.code, '42P01');
  assert.equal(error.message, 'products.list: relation "products" does not exist');
});
