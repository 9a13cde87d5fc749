export declare const ambient: number;
