/**
 * Pool of free seats backed by a binary min-heap
 *
 * `extractMin` always hands out the lowest-numbered free seat. Seat ids are
 * unique, so no tie-breaking is needed.
 */
export class SeatPool {
    private heap: number[] = [];

    insert(seatId: number): void {
        this.heap.push(seatId);
        this.siftUp(this.heap.length - 1);
    }

    /**
     * Remove and return the lowest free seat
     *
     * @returns Seat id, or null when the pool is empty
     */
    extractMin(): number | null {
        const heap = this.heap;
        if (heap.length === 0) return null;

        const min = heap[0];
        const last = heap.pop();
        if (heap.length > 0 && last !== undefined) {
            heap[0] = last;
            this.siftDown(0);
        }
        return min;
    }

    peek(): number | null {
        return this.heap.length > 0 ? this.heap[0] : null;
    }

    isEmpty(): boolean {
        return this.heap.length === 0;
    }

    size(): number {
        return this.heap.length;
    }

    /** Copy of the heap in layout order */
    toArray(): number[] {
        return [...this.heap];
    }

    private siftUp(index: number): void {
        const heap = this.heap;
        let i = index;
        while (i > 0) {
            const parent = (i - 1) >> 1;
            if (heap[parent] <= heap[i]) break;
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
            let smallest = i;
            if (left < n && heap[left] < heap[smallest]) smallest = left;
            if (right < n && heap[right] < heap[smallest]) smallest = right;
            if (smallest === i) break;
            [heap[smallest], heap[i]] = [heap[i], heap[smallest]];
            i = smallest;
        }
    }
}
