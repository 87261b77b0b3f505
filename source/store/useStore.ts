import {create} from 'zustand';
import {CATEGORIES, type AnalyzedVm, type Category} from '../core/types.js';

export type SortKey = 'input' | 'score' | 'name';

export type SortDirection = 'asc' | 'desc';

export type ViewOptions = {
	filterText: string;
	categoryFilter: Category | null;
	sortKey: SortKey;
	sortDirection: SortDirection;
};

export type StoreState = ViewOptions & {
	entries: AnalyzedVm[];
	visible: AnalyzedVm[];
	cursorIndex: number;
	isLoading: boolean;
	error: string | null;
	statusMessage: string | null;
	reportDir: string | null;
	showDetails: boolean;
	filterMode: boolean;
};

export type StoreActions = {
	setEntries: (entries: AnalyzedVm[]) => void;
	setLoading: (isLoading: boolean) => void;
	setError: (error: string | null) => void;
	setStatus: (message: string | null) => void;
	setReportDir: (reportDir: string | null) => void;
	moveCursor: (delta: number) => void;
	setCursor: (index: number) => void;
	toggleDetails: () => void;
	startFilter: () => void;
	stopFilter: () => void;
	updateFilterText: (text: string) => void;
	clearFilter: () => void;
	cycleSort: () => void;
	toggleSortDirection: () => void;
	cycleCategory: () => void;
};

export type VmStore = StoreState & StoreActions;

const SORT_ORDER: SortKey[] = ['input', 'score', 'name'];

const comparators: Record<Exclude<SortKey, 'input'>, (a: AnalyzedVm, b: AnalyzedVm) => number> = {
	score: (a, b) => a.result.riskScore - b.result.riskScore,
	name: (a, b) => a.name.localeCompare(b.name),
};

const matchesFilter = (entry: AnalyzedVm, term: string) =>
	`${entry.vmId} ${entry.name} ${entry.guestOs}`.toLowerCase().includes(term);

/** Filters then sorts; equal keys keep inventory order in both directions. */
export const applyView = (entries: readonly AnalyzedVm[], view: ViewOptions): AnalyzedVm[] => {
	const term = view.filterText.trim().toLowerCase();
	const filtered = entries.filter(
		entry =>
			(view.categoryFilter === null || entry.result.category === view.categoryFilter) &&
			(!term || matchesFilter(entry, term)),
	);

	if (view.sortKey === 'input') {
		return view.sortDirection === 'asc' ? filtered : filtered.reverse();
	}

	const compare = comparators[view.sortKey];
	return filtered.sort((a, b) => (view.sortDirection === 'asc' ? compare(a, b) : compare(b, a)));
};

const clampCursor = (index: number, length: number) =>
	Math.max(0, Math.min(Math.max(0, length - 1), index));

export const nextCategory = (current: Category | null): Category | null => {
	if (current === null) return CATEGORIES[0];
	const index = CATEGORIES.indexOf(current);
	return CATEGORIES[index + 1] ?? null;
};

export const createVmStore = () =>
	create<VmStore>((set, get) => {
		const refresh = (patch: Partial<StoreState>) => {
			const next = {...get(), ...patch};
			const visible = applyView(next.entries, next);
			set({
				...patch,
				visible,
				cursorIndex: clampCursor(next.cursorIndex, visible.length),
			});
		};

		return {
			entries: [],
			visible: [],
			cursorIndex: 0,
			isLoading: true,
			error: null,
			statusMessage: null,
			reportDir: null,
			showDetails: true,
			filterMode: false,
			filterText: '',
			categoryFilter: null,
			sortKey: 'input',
			sortDirection: 'asc',
			setEntries: entries => refresh({entries, cursorIndex: 0}),
			setLoading: isLoading => set({isLoading}),
			setError: error => set({error}),
			setStatus: statusMessage => set({statusMessage}),
			setReportDir: reportDir => set({reportDir}),
			moveCursor: delta => {
				const {visible, cursorIndex} = get();
				if (visible.length === 0) return;
				set({cursorIndex: clampCursor(cursorIndex + delta, visible.length)});
			},
			setCursor: index => set({cursorIndex: clampCursor(index, get().visible.length)}),
			toggleDetails: () => set({showDetails: !get().showDetails}),
			startFilter: () => set({filterMode: true}),
			stopFilter: () => set({filterMode: false}),
			updateFilterText: filterText => refresh({filterText}),
			clearFilter: () => refresh({filterText: '', filterMode: false}),
			cycleSort: () => {
				const index = SORT_ORDER.indexOf(get().sortKey);
				refresh({sortKey: SORT_ORDER[(index + 1) % SORT_ORDER.length] ?? 'input'});
			},
			toggleSortDirection: () =>
				refresh({sortDirection: get().sortDirection === 'asc' ? 'desc' : 'asc'}),
			cycleCategory: () => refresh({categoryFilter: nextCategory(get().categoryFilter)}),
		};
	});

export const useStore = createVmStore();
