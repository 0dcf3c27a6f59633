
const isDigit = (ch: string | undefined): boolean =>
    ch !== undefined && ch >= '0' && ch <= '9';
const isAlpha = (ch: string | undefined): boolean =>
    ch !== undefined && /^[A-Za-z]$/.test(ch);
const isAlnum = (ch: string | undefined): boolean => isDigit(ch) || isAlpha(ch);

const compareSegments = (a: string, b: string): number => {
    if (a === b) {
        return 0;
    }
    let one = 0;
    let two = 0;

    while (one < a.length && two < b.length) {
        const start1 = one;
        const start2 = two;
        while (one < a.length && !isAlnum(a[one])) one++;
        while (two < b.length && !isAlnum(b[two])) two++;

        if (one >= a.length || two >= b.length) {
            break;
        }
        // differing separator runs decide on their own
        if (one - start1 !== two - start2) {
            return one - start1 < two - start2 ? -1 : 1;
        }

        const seg1Start = one;
        const seg2Start = two;
        const numeric = isDigit(a[one]);
        if (numeric) {
            while (one < a.length && isDigit(a[one])) one++;
            while (two < b.length && isDigit(b[two])) two++;
        } else {
            while (one < a.length && isAlpha(a[one])) one++;
            while (two < b.length && isAlpha(b[two])) two++;
        }

        let seg1 = a.slice(seg1Start, one);
        let seg2 = b.slice(seg2Start, two);
        if (seg2 === '') {
            // numeric segments always beat alpha ones
            return numeric ? 1 : -1;
        }

        if (numeric) {
            seg1 = seg1.replace(/^0+/, '');
            seg2 = seg2.replace(/^0+/, '');
            if (seg1.length !== seg2.length) {
                return seg1.length > seg2.length ? 1 : -1;
            }
        }
        if (seg1 !== seg2) {
            return seg1 < seg2 ? -1 : 1;
        }
    }

    const restOne = one < a.length ? a[one] : undefined;
    const restTwo = two < b.length ? b[two] : undefined;
    if (restOne === undefined && restTwo === undefined) {
        return 0;
    }
    // a leftover alpha segment never beats an exhausted string
    if ((restOne === undefined && !isAlpha(restTwo)) || isAlpha(restOne)) {
        return -1;
    }
    return 1;
};

interface Evr {
    epoch: string;
    version: string;
    release: string | undefined;
}

const parseEvr = (value: string): Evr => {
    let epoch = '0';
    let rest = value;
    const colon = value.indexOf(':');
    if (colon > 0 && /^\d+$/.test(value.slice(0, colon))) {
        epoch = value.slice(0, colon);
        rest = value.slice(colon + 1);
    } else if (colon === 0) {
        rest = value.slice(1);
    }
    const dash = rest.lastIndexOf('-');
    if (dash === -1) {
        return { epoch, version: rest, release: undefined };
    }
    return {
        epoch,
        version: rest.slice(0, dash),
        release: rest.slice(dash + 1),
    };
};

const vercmp = (a: string, b: string): number => {
    if (a === b) {
        return 0;
    }
    const left = parseEvr(a);
    const right = parseEvr(b);
    let result = compareSegments(left.epoch, right.epoch);
    if (result === 0) {
        result = compareSegments(left.version, right.version);
    }
    if (result === 0 && left.release !== undefined && right.release !== undefined) {
        result = compareSegments(left.release, right.release);
    }
    return result;
};

const maxVersion = (versions: string[]): string | undefined =>
    versions.reduce<string | undefined>(
        (best, current) =>
            best === undefined || vercmp(current, best) > 0 ? current : best,
        undefined,
    );

export { vercmp, maxVersion, parseEvr };
