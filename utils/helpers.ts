// utils/helpers.ts

// 1. Clean up messy text (HTML tags, extra spaces)
export const cleanText = (text: string): string => {
    if (!text) return "";
    // Remove HTML tags
    let clean = text.replace(/<[^>]*>?/gm, '');
    // Remove NewsAPI "[+123 chars]" suffixes
    clean = clean.replace(/\[\+\d+\s?chars\]/g, '');
    // Decode the entities search APIs commonly leave behind
    clean = clean
        .replace(/&amp;/g, '&')
        .replace(/&quot;/g, '"')
        .replace(/&#39;/g, "'")
        .replace(/&lt;/g, '<')
        .replace(/&gt;/g, '>');
    // Normalize whitespace (turn multiple spaces/newlines into single space)
    return clean.replace(/\s+/g, ' ').trim();
};

// 2. Truncate to at most maxLength characters
export const truncate = (text: string, maxLength: number): string => {
    if (text.length <= maxLength) return text;
    return text.substring(0, maxLength);
};

// 3. Display date for article listings ("January 15, 2025")
export const formatDisplayDate = (value: string | undefined): string => {
    if (!value) return 'Unknown date';
    const date = new Date(value);
    if (Number.isNaN(date.getTime())) return 'Unknown date';
    return date.toLocaleDateString('en-US', {
        year: 'numeric',
        month: 'long',
        day: 'numeric',
        timeZone: 'UTC'
    });
};

// 4. Smart URL Normalization (drop tracking params and fragments)
export const normalizeUrl = (url: string): string => {
    if (!url) return "";
    try {
        const urlObj = new URL(url);

        // A. Remove Fragment (#section)
        urlObj.hash = '';

        // B. Strip tracking parameters but keep ones that identify content
        const trackingParams = [...urlObj.searchParams.keys()].filter(
            (key) => key.startsWith('utm_') || key === 'fbclid' || key === 'gclid'
        );
        trackingParams.forEach((key) => urlObj.searchParams.delete(key));

        // C. Remove Trailing Slash (example.com/story/ == example.com/story)
        let finalUrl = urlObj.toString();
        if (finalUrl.endsWith('/')) {
            finalUrl = finalUrl.slice(0, -1);
        }

        return finalUrl;

    } catch {
        return url;
    }
};

// 5. Error message from anything thrown
export const getErrorMessage = (error: unknown): string => {
    if (error instanceof Error) return error.message;
    return String(error);
};

// 6. Node system error code check (ENOENT, EACCES, ...)
export const hasErrorCode = (error: unknown, code: string): boolean =>
    error instanceof Error && 'code' in error && error.code === code;
