import type { SeatAssignment } from '../types';

type Color = 'red' | 'black';

interface TreeNode {
    userId: number;
    seatId: number;
    color: Color;
    left: number;
    right: number;
    parent: number;
}

/** Index of the shared black sentinel standing in for every absent child and the root's parent */
const NIL = 0;

/**
 * Active reservations keyed by user id
 *
 * Red-black tree whose nodes live in an arena and link to each other by slot
 * index. Slot 0 is the black sentinel; slots freed by `delete` are reused by
 * later inserts.
 *
 * Invariants after every public call:
 * - the root is black
 * - a red node never has a red parent
 * - every path from a node down to the sentinel crosses the same number of black nodes
 *
 * Search, insert and delete are O(log n). In-order traversal is ascending by user id.
 */
export class ReservationIndex {
    private nodes: TreeNode[] = [ReservationIndex.sentinel()];
    private freeSlots: number[] = [];
    private root = NIL;
    private count = 0;

    private static sentinel(): TreeNode {
        return { userId: 0, seatId: 0, color: 'black', left: NIL, right: NIL, parent: NIL };
    }

    size(): number {
        return this.count;
    }

    /**
     * Look up the seat held by a user
     *
     * @returns Seat id, or null when the user holds no reservation
     */
    search(userId: number): number | null {
        const slot = this.find(userId);
        return slot === NIL ? null : this.nodes[slot].seatId;
    }

    has(userId: number): boolean {
        return this.find(userId) !== NIL;
    }

    /**
     * Record a reservation
     *
     * @throws Error if the user already holds a reservation
     */
    insert(userId: number, seatId: number): void {
        const n = this.nodes;
        let parent = NIL;
        let current = this.root;
        while (current !== NIL) {
            parent = current;
            if (userId === n[current].userId) {
                throw new Error(`User ${userId} already holds seat ${n[current].seatId}`);
            }
            current = userId < n[current].userId ? n[current].left : n[current].right;
        }

        const slot = this.allocate(userId, seatId, parent);
        if (parent === NIL) {
            this.root = slot;
        } else if (userId < n[parent].userId) {
            n[parent].left = slot;
        } else {
            n[parent].right = slot;
        }
        this.count++;
        this.insertFixup(slot);
    }

    /**
     * Remove a user's reservation
     *
     * A node with two children is replaced by its in-order successor, and the
     * rebalancing starts where the successor was unlinked.
     *
     * @returns true if a reservation was removed, false if the user held none
     */
    delete(userId: number): boolean {
        const n = this.nodes;
        const z = this.find(userId);
        if (z === NIL) return false;

        let removedColor = n[z].color;
        let x: number;

        if (n[z].left === NIL) {
            x = n[z].right;
            this.transplant(z, n[z].right);
        } else if (n[z].right === NIL) {
            x = n[z].left;
            this.transplant(z, n[z].left);
        } else {
            const y = this.minimum(n[z].right);
            removedColor = n[y].color;
            x = n[y].right;
            if (n[y].parent === z) {
                n[x].parent = y;
            } else {
                this.transplant(y, n[y].right);
                n[y].right = n[z].right;
                n[n[y].right].parent = y;
            }
            this.transplant(z, y);
            n[y].left = n[z].left;
            n[n[y].left].parent = y;
            n[y].color = n[z].color;
        }

        if (removedColor === 'black') this.deleteFixup(x);

        n[NIL].parent = NIL;
        this.release(z);
        this.count--;
        return true;
    }

    /** All reservations, ascending by user id */
    entries(): SeatAssignment[] {
        return this.entriesInRange(-Infinity, Infinity);
    }

    /**
     * Reservations of users with `lo <= userId <= hi`, ascending by user id
     *
     * Subtrees entirely outside the range are skipped.
     */
    entriesInRange(lo: number, hi: number): SeatAssignment[] {
        const n = this.nodes;
        const result: SeatAssignment[] = [];
        const stack: number[] = [];
        let current = this.root;

        while (current !== NIL || stack.length > 0) {
            while (current !== NIL) {
                stack.push(current);
                current = n[current].userId > lo ? n[current].left : NIL;
            }
            const slot = stack.pop();
            if (slot === undefined) break;

            const { userId, seatId } = n[slot];
            if (userId > hi) break;
            if (userId >= lo) result.push({ userId, seatId });
            current = n[slot].right;
        }

        return result;
    }

    /**
     * Check the search-tree order, parent links and red-black rules
     *
     * @returns true when every invariant holds
     */
    isBalanced(): boolean {
        const n = this.nodes;
        if (n[this.root].color !== 'black') return false;
        if (this.root !== NIL && n[this.root].parent !== NIL) return false;

        let visited = 0;
        const blackHeight = (slot: number, lo: number, hi: number): number => {
            if (slot === NIL) return 1;
            visited++;
            const node = n[slot];
            if (node.userId <= lo || node.userId >= hi) return -1;
            if (node.left !== NIL && n[node.left].parent !== slot) return -1;
            if (node.right !== NIL && n[node.right].parent !== slot) return -1;
            if (node.color === 'red' && (n[node.left].color === 'red' || n[node.right].color === 'red')) return -1;

            const left = blackHeight(node.left, lo, node.userId);
            const right = blackHeight(node.right, node.userId, hi);
            if (left === -1 || right === -1 || left !== right) return -1;
            return left + (node.color === 'black' ? 1 : 0);
        };

        return blackHeight(this.root, -Infinity, Infinity) !== -1 && visited === this.count;
    }

    private find(userId: number): number {
        const n = this.nodes;
        let current = this.root;
        while (current !== NIL && n[current].userId !== userId) {
            current = userId < n[current].userId ? n[current].left : n[current].right;
        }
        return current;
    }

    private minimum(slot: number): number {
        let current = slot;
        while (this.nodes[current].left !== NIL) current = this.nodes[current].left;
        return current;
    }

    private allocate(userId: number, seatId: number, parent: number): number {
        const node: TreeNode = { userId, seatId, color: 'red', left: NIL, right: NIL, parent };
        const reused = this.freeSlots.pop();
        if (reused !== undefined) {
            this.nodes[reused] = node;
            return reused;
        }
        this.nodes.push(node);
        return this.nodes.length - 1;
    }

    private release(slot: number): void {
        this.nodes[slot] = ReservationIndex.sentinel();
        this.freeSlots.push(slot);
    }

    /** Put subtree `v` where subtree `u` hangs */
    private transplant(u: number, v: number): void {
        const n = this.nodes;
        const parent = n[u].parent;
        if (parent === NIL) {
            this.root = v;
        } else if (u === n[parent].left) {
            n[parent].left = v;
        } else {
            n[parent].right = v;
        }
        n[v].parent = parent;
    }

    private rotateLeft(x: number): void {
        const n = this.nodes;
        const y = n[x].right;
        n[x].right = n[y].left;
        if (n[y].left !== NIL) n[n[y].left].parent = x;
        this.transplant(x, y);
        n[y].left = x;
        n[x].parent = y;
    }

    private rotateRight(x: number): void {
        const n = this.nodes;
        const y = n[x].left;
        n[x].left = n[y].right;
        if (n[y].right !== NIL) n[n[y].right].parent = x;
        this.transplant(x, y);
        n[y].right = x;
        n[x].parent = y;
    }

    private insertFixup(inserted: number): void {
        const n = this.nodes;
        let z = inserted;

        while (n[n[z].parent].color === 'red') {
            const parent = n[z].parent;
            const grandparent = n[parent].parent;

            if (parent === n[grandparent].left) {
                const uncle = n[grandparent].right;
                if (n[uncle].color === 'red') {
                    n[parent].color = 'black';
                    n[uncle].color = 'black';
                    n[grandparent].color = 'red';
                    z = grandparent;
                    continue;
                }
                if (z === n[parent].right) {
                    z = parent;
                    this.rotateLeft(z);
                }
                n[n[z].parent].color = 'black';
                n[grandparent].color = 'red';
                this.rotateRight(grandparent);
            } else {
                const uncle = n[grandparent].left;
                if (n[uncle].color === 'red') {
                    n[parent].color = 'black';
                    n[uncle].color = 'black';
                    n[grandparent].color = 'red';
                    z = grandparent;
                    continue;
                }
                if (z === n[parent].left) {
                    z = parent;
                    this.rotateRight(z);
                }
                n[n[z].parent].color = 'black';
                n[grandparent].color = 'red';
                this.rotateLeft(grandparent);
            }
        }

        n[this.root].color = 'black';
    }

    /** `x` carries an extra black after its subtree lost a black node */
    private deleteFixup(start: number): void {
        const n = this.nodes;
        let x = start;

        while (x !== this.root && n[x].color === 'black') {
            const parent = n[x].parent;

            if (x === n[parent].left) {
                let sibling = n[parent].right;
                if (n[sibling].color === 'red') {
                    n[sibling].color = 'black';
                    n[parent].color = 'red';
                    this.rotateLeft(parent);
                    sibling = n[parent].right;
                }
                if (n[n[sibling].left].color === 'black' && n[n[sibling].right].color === 'black') {
                    n[sibling].color = 'red';
                    x = parent;
                    continue;
                }
                if (n[n[sibling].right].color === 'black') {
                    n[n[sibling].left].color = 'black';
                    n[sibling].color = 'red';
                    this.rotateRight(sibling);
                    sibling = n[parent].right;
                }
                n[sibling].color = n[parent].color;
                n[parent].color = 'black';
                n[n[sibling].right].color = 'black';
                this.rotateLeft(parent);
                x = this.root;
            } else {
                let sibling = n[parent].left;
                if (n[sibling].color === 'red') {
                    n[sibling].color = 'black';
                    n[parent].color = 'red';
                    this.rotateRight(parent);
                    sibling = n[parent].left;
                }
                if (n[n[sibling].right].color === 'black' && n[n[sibling].left].color === 'black') {
                    n[sibling].color = 'red';
                    x = parent;
                    continue;
                }
                if (n[n[sibling].left].color === 'black') {
                    n[n[sibling].right].color = 'black';
                    n[sibling].color = 'red';
                    this.rotateLeft(sibling);
                    sibling = n[parent].left;
                }
                n[sibling].color = n[parent].color;
                n[parent].color = 'black';
                n[n[sibling].left].color = 'black';
                this.rotateRight(parent);
                x = this.root;
            }
        }

        n[x].color = 'black';
    }
}
