export const VIEWER_DEFAULTS = {
    sensors: {
        windowSize: 500,
        resizeStep: 10,
        navigateStep: 10
    },
    gps: {
        windowSize: 20,
        resizeStep: 5,
        navigateStep: 5
    },
    labels: {
        searchHorizonSeconds: 60,
        maxLines: 7
    },
    progress: {
        loadEveryRows: 1000,
        saveEveryRows: 500
    },
    gpsValidByDefault: true
};

export const PLACEHOLDER_TEXT = '...';
