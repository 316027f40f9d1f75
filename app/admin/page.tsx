'use client';

import { useCallback, useEffect, useMemo, useState } from 'react';
import { AgGridReact } from 'ag-grid-react';
import type { CellValueChangedEvent, ColDef, ICellRendererParams } from 'ag-grid-community';
import 'ag-grid-community/styles/ag-grid.css';
import 'ag-grid-community/styles/ag-theme-quartz.css';
import Sidebar from '@/components/Sidebar';
import PageHeader from '@/components/PageHeader';
import AppToast, { type ToastState } from '@/components/AppToast';
import ConfirmModal from '@/components/ConfirmModal';
import FieldErrors from '@/components/FieldErrors';
import { ADMIN_ENTITIES, ADMIN_ENTITY_KEYS, type AdminEntityKey } from '@/lib/admin-entities';
import { fetchJson, sendJson } from '@/lib/auth-fetch';
import { fieldErrorsOf, formatError, type FieldError } from '@/lib/errors';
import { useRouteGuard } from '@/lib/route-guard';

type AdminRow = Record<string, unknown>;

const READ_ONLY_COLUMNS = new Set(['id', 'created_at', 'date_taken', 'date_settled', 'last_reminder_date']);

function rowId(row: AdminRow | undefined) {
  const id = row?.id;
  return typeof id === 'number' ? id : null;
}

export default function AdminPage() {
  const { isChecking, isAuthorized, role } = useRouteGuard(['owner']);
  const [entity, setEntity] = useState<AdminEntityKey>('products');
  const [rows, setRows] = useState<AdminRow[]>([]);
  const [draft, setDraft] = useState<Record<string, string>>({});
  const [formErrors, setFormErrors] = useState<FieldError[]>([]);
  const [deletingId, setDeletingId] = useState<number | null>(null);
  const [loading, setLoading] = useState(true);
  const [saving, setSaving] = useState(false);
  const [toast, setToast] = useState<ToastState | null>(null);

  const meta = ADMIN_ENTITIES[entity];

  const loadRows = useCallback(async () => {
    setLoading(true);
    try {
      const { data } = await fetchJson<AdminRow[]>(`/api/admin/${entity}`);
      setRows(data);
    } catch (error) {
      setToast({ type: 'error', message: `Failed to load ${ADMIN_ENTITIES[entity].label}: ${formatError(error)}` });
    } finally {
      setLoading(false);
    }
  }, [entity]);

  useEffect(() => {
    if (!isAuthorized) return;
    setDraft({});
    setFormErrors([]);
    void loadRows();
  }, [isAuthorized, loadRows]);

  const handleCellValueChanged = useCallback(
    async (event: CellValueChangedEvent<AdminRow>) => {
      const id = rowId(event.data);
      const field = event.colDef.field;
      if (id === null || !field) return;
      try {
        await sendJson(`/api/admin/${entity}`, 'PUT', { id, [field]: event.newValue });
        setToast({ type: 'success', message: `${meta.label} #${id} updated.` });
      } catch (error) {
        setToast({ type: 'error', message: `Update failed: ${formatError(error)}` });
      }
      await loadRows();
    },
    [entity, meta.label, loadRows]
  );

  const columnDefs = useMemo<ColDef<AdminRow>[]>(() => {
    const dataColumns: ColDef<AdminRow>[] = meta.columns.map((column) => ({
      headerName: column,
      field: column,
      editable: meta.canUpdate && !READ_ONLY_COLUMNS.has(column) && !meta.lockedColumns?.includes(column),
      minWidth: column === 'id' ? 80 : 130,
      pinned: column === 'id' ? 'left' : undefined,
    }));
    if (!meta.canDelete) return dataColumns;
    return [
      ...dataColumns,
      {
        headerName: 'Actions',
        editable: false,
        minWidth: 110,
        pinned: 'right',
        cellRenderer: (params: ICellRendererParams<AdminRow>) => {
          const id = rowId(params.data);
          return (
            <button
              type="button"
              onClick={() => setDeletingId(id)}
              disabled={id === null}
              className="rounded bg-rose-100 px-2 py-1 text-xs font-semibold text-rose-700 hover:bg-rose-200 disabled:opacity-50"
            >
              Delete
            </button>
          );
        },
      },
    ];
  }, [meta]);

  const defaultColDef = useMemo<ColDef<AdminRow>>(
    () => ({
      sortable: true,
      filter: true,
      resizable: true,
    }),
    []
  );

  const createRecord = async (e: React.FormEvent) => {
    e.preventDefault();
    setSaving(true);
    setFormErrors([]);
    try {
      await sendJson(`/api/admin/${entity}`, 'POST', draft);
      setToast({ type: 'success', message: `${meta.label} record created.` });
      setDraft({});
      await loadRows();
    } catch (error) {
      setFormErrors(fieldErrorsOf(error));
      setToast({ type: 'error', message: `Create failed: ${formatError(error)}` });
    } finally {
      setSaving(false);
    }
  };

  const deleteRecord = async (id: number) => {
    setSaving(true);
    try {
      await sendJson(`/api/admin/${entity}?id=${id}`, 'DELETE');
      setToast({ type: 'success', message: `${meta.label} #${id} deleted.` });
      await loadRows();
    } catch (error) {
      setToast({ type: 'error', message: `Delete failed: ${formatError(error)}` });
    } finally {
      setSaving(false);
      setDeletingId(null);
    }
  };

  if (isChecking) {
    return <div className="min-h-screen bg-slate-100 text-slate-700 flex items-center justify-center">Checking access...</div>;
  }

  if (!isAuthorized) return null;

  const createColumns = meta.columns.filter((column) => !READ_ONLY_COLUMNS.has(column));

  return (
    <div className="flex h-screen bg-slate-100 text-slate-900">
      <Sidebar role={role} />
      {toast && <AppToast type={toast.type} message={toast.message} onClose={() => setToast(null)} />}
      <ConfirmModal
        isOpen={deletingId !== null}
        title={`Delete ${meta.label} #${deletingId ?? ''}?`}
        message="Records that others depend on are protected and will not be deleted."
        confirmLabel="Delete"
        loading={saving}
        onConfirm={() => deletingId !== null && void deleteRecord(deletingId)}
        onCancel={() => setDeletingId(null)}
      />
      <div className="flex-1 flex flex-col overflow-hidden">
        <PageHeader title="Admin" subtitle="Browse and correct shop records" role={role} />
        <main className="flex-1 p-6 overflow-y-auto space-y-6">
          <div className="flex flex-wrap gap-2">
            {ADMIN_ENTITY_KEYS.map((key) => (
              <button
                key={key}
                onClick={() => setEntity(key)}
                className={`px-3 py-2 rounded-lg text-sm font-semibold ${
                  entity === key ? 'bg-emerald-600 text-white' : 'bg-white border border-slate-200 text-slate-700'
                }`}
              >
                {ADMIN_ENTITIES[key].label}
              </button>
            ))}
          </div>

          <p className="text-sm text-slate-500">
            {rows.length} rows · {meta.canUpdate ? 'click a cell to edit' : 'read only'}
            {meta.canCreate ? '' : ' · records are created by the shop workflows'}
          </p>

          <div className="rounded-xl border border-slate-200 bg-white p-3">
            <div className="ag-theme-quartz h-[520px] w-full">
              <AgGridReact<AdminRow>
                rowData={rows}
                columnDefs={columnDefs}
                defaultColDef={defaultColDef}
                getRowId={(params) => String(params.data.id)}
                onCellValueChanged={(event) => void handleCellValueChanged(event)}
                stopEditingWhenCellsLoseFocus
                loading={loading}
              />
            </div>
          </div>

          {meta.canCreate && (
            <form onSubmit={(e) => void createRecord(e)} className="bg-white border border-slate-200 rounded-2xl p-5">
              <h2 className="font-bold text-lg mb-3">New {meta.label} record</h2>
              <div className="grid grid-cols-2 lg:grid-cols-4 gap-3">
                {createColumns.map((column) => (
                  <input
                    key={column}
                    value={draft[column] ?? ''}
                    onChange={(e) => setDraft({ ...draft, [column]: e.target.value })}
                    placeholder={column}
                    className="px-3 py-2 border border-slate-300 rounded-lg bg-white"
                  />
                ))}
              </div>
              <FieldErrors errors={formErrors} />
              <button type="submit" disabled={saving} className="mt-4 px-4 py-2 rounded-lg bg-emerald-600 text-white font-semibold disabled:opacity-50">
                {saving ? 'Saving...' : 'Create'}
              </button>
            </form>
          )}
        </main>
      </div>
    </div>
  );
}
