import type { WaitlistEntry } from '../types';

/**
 * Ordering used by every waitlist heap operation
 *
 * Higher priority wins; on equal priority the earlier sequence wins, so users
 * with the same priority are served in arrival order.
 */
export const hasHigherPriority = (a: WaitlistEntry, b: WaitlistEntry): boolean => {
    if (a.priority !== b.priority) return a.priority > b.priority;
    return a.sequence < b.sequence;
};

/**
 * Waitlist of users ordered by (priority desc, sequence asc)
 *
 * Binary heap with two operations a textbook priority queue lacks: removal of an
 * arbitrary user and in-place re-keying. Both locate the entry by a linear scan
 * and then repair the heap in logarithmic time.
 */
export class WaitlistQueue {
    private heap: WaitlistEntry[] = [];
    private nextSequence = 0;

    /**
     * Add a user to the waitlist
     *
     * Callers make sure the user is not already waiting.
     *
     * @returns The stored entry with its assigned sequence number
     */
    insert(userId: number, priority: number): WaitlistEntry {
        const entry: WaitlistEntry = { userId, priority, sequence: this.nextSequence++ };
        this.heap.push(entry);
        this.siftUp(this.heap.length - 1);
        return { ...entry };
    }

    peek(): WaitlistEntry | null {
        return this.heap.length > 0 ? { ...this.heap[0] } : null;
    }

    /**
     * Remove and return the next user to be served
     *
     * @returns The top entry, or null when nobody is waiting
     */
    extractTop(): WaitlistEntry | null {
        const heap = this.heap;
        if (heap.length === 0) return null;

        const top = heap[0];
        const last = heap.pop();
        if (heap.length > 0 && last !== undefined) {
            heap[0] = last;
            this.siftDown(0);
        }
        return top;
    }

    /**
     * Remove a user wherever they sit in the heap
     *
     * @returns true if the user was waiting, false otherwise (nothing changes)
     */
    remove(userId: number): boolean {
        const index = this.indexOf(userId);
        if (index === -1) return false;

        const last = this.heap.pop();
        if (index < this.heap.length && last !== undefined) {
            this.heap[index] = last;
            this.restore(index);
        }
        return true;
    }

    /**
     * Change a waiting user's priority
     *
     * The original sequence number is kept, so a re-prioritized user still ranks
     * behind earlier arrivals that hold the same new priority.
     *
     * @returns true if the user was waiting, false otherwise (nothing changes)
     */
    updatePriority(userId: number, newPriority: number): boolean {
        const index = this.indexOf(userId);
        if (index === -1) return false;

        this.heap[index] = { ...this.heap[index], priority: newPriority };
        this.restore(index);
        return true;
    }

    has(userId: number): boolean {
        return this.indexOf(userId) !== -1;
    }

    isEmpty(): boolean {
        return this.heap.length === 0;
    }

    size(): number {
        return this.heap.length;
    }

    /** Copy of the entries in heap layout order */
    toArray(): WaitlistEntry[] {
        return this.heap.map(entry => ({ ...entry }));
    }

    /** Copy of the entries in the order they would be served */
    ordered(): WaitlistEntry[] {
        return this.toArray().sort((a, b) => (hasHigherPriority(a, b) ? -1 : hasHigherPriority(b, a) ? 1 : 0));
    }

    private indexOf(userId: number): number {
        return this.heap.findIndex(entry => entry.userId === userId);
    }

    /** Sift the element at `index` in whichever direction it violates the order */
    private restore(index: number): void {
        const parent = (index - 1) >> 1;
        if (index > 0 && hasHigherPriority(this.heap[index], this.heap[parent])) {
            this.siftUp(index);
        } else {
            this.siftDown(index);
        }
    }

    private siftUp(index: number): void {
        const heap = this.heap;
        let i = index;
        while (i > 0) {
            const parent = (i - 1) >> 1;
            if (!hasHigherPriority(heap[i], heap[parent])) break;
            [heap[parent], heap[i]] = [heap[i], heap[parent]];
            i = parent;
        }
    }

    private siftDown(index: number): void {
        const heap = this.heap;
        const n = heap.length;
        let i = index;
        while (true) {
            const left = 2 * i + 1;
            const right = left + 1;
            let best = i;
            if (left < n && hasHigherPriority(heap[left], heap[best])) best = left;
            if (right < n && hasHigherPriority(heap[right], heap[best])) best = right;
            if (best === i) break;
            [heap[best], heap[i]] = [heap[i], heap[best]];
            i = best;
        }
    }
}
