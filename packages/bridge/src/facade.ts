import type { PermissionState } from '@hostbridge/types';

export interface FacadeOptions {
  loadId: string;
  /** Global the facade installs its receiver under. Must be a plain identifier. */
  namespace: string;
  /** Expression taking one serialized message, e.g. `window.hostBridgeChannel.postMessage`. */
  channel: string;
  forwardConsole: boolean;
  /** Cached notification permission, so `Notification.permission` starts out accurate. */
  notificationPermission: PermissionState;
}

/**
 * Renders the script injected into content on every load. It installs web-API lookalikes
 * that turn calls into `call` messages and settles them from the host's `result` messages,
 * delivered through `<namespace>.receive(json)`.
 */
export function renderFacadeScript(options: FacadeOptions): string {
  const { loadId, namespace, channel, forwardConsole, notificationPermission } = options;

  return `(function () {
  'use strict';
  var LOAD_ID = ${JSON.stringify(loadId)};
  var NAMESPACE = ${JSON.stringify(namespace)};
  var FORWARD_CONSOLE = ${forwardConsole ? 'true' : 'false'};
  var NOTIFICATION_STATE = ${JSON.stringify(notificationPermission)};
  var root = typeof window !== 'undefined' ? window : globalThis;
  var nextCall = 1;
  var nextWatch = 1;
  var pending = {};
  var watchers = {};
  var watchIds = {};

  function send(message) {
    ${channel}(JSON.stringify(message));
  }

  function ignore() {}

  function define(target, name, value) {
    try {
      Object.defineProperty(target, name, { value: value, configurable: true, enumerable: true, writable: true });
    } catch (e) {
      target[name] = value;
    }
  }

  // accept runs inside receive, before any later message is handled
  function call(capability, args, accept) {
    return new Promise(function (resolve, reject) {
      var correlationId = LOAD_ID + ':' + nextCall++;
      pending[correlationId] = { resolve: resolve, reject: reject, accept: accept };
      try {
        send({ type: 'call', loadId: LOAD_ID, correlationId: correlationId, capability: capability, args: args === undefined ? null : args });
      } catch (e) {
        delete pending[correlationId];
        reject(e);
      }
    });
  }

  function toError(failure) {
    var error = new Error(failure.message);
    error.name = failure.kind;
    return error;
  }

  function toPositionError(failure) {
    var code = failure.kind === 'PermissionDenied' ? 1 : failure.kind === 'Timeout' ? 3 : 2;
    return { code: code, message: failure.message, PERMISSION_DENIED: 1, POSITION_UNAVAILABLE: 2, TIMEOUT: 3 };
  }

  function receive(message) {
    if (typeof message === 'string') message = JSON.parse(message);
    if (!message || typeof message !== 'object') return;
    if (message.type === 'result') {
      var entry = pending[message.correlationId];
      if (!entry) return;
      delete pending[message.correlationId];
      if (message.outcome.status === 'success') {
        if (typeof entry.accept === 'function') entry.accept(message.outcome.value);
        entry.resolve(message.outcome.value);
      } else {
        entry.reject(toError(message.outcome.error));
      }
    } else if (message.type === 'event') {
      var watcher = watchers[message.subscriptionId];
      if (watcher && typeof watcher.success === 'function') watcher.success(message.payload);
    } else if (message.type === 'subscriptionError') {
      var failed = watchers[message.subscriptionId];
      delete watchers[message.subscriptionId];
      if (failed && typeof failed.error === 'function') failed.error(toPositionError(message.error));
    }
  }

  define(root, NAMESPACE, { loadId: LOAD_ID, call: call, receive: receive });

  var nav = root.navigator || (root.navigator = {});

  // Clipboard
  var clipboard = nav.clipboard || {};
  clipboard.writeText = function (text) {
    return call('clipboard.write', { text: String(text) }).then(ignore);
  };
  clipboard.readText = function () {
    return call('clipboard.read', null);
  };
  define(nav, 'clipboard', clipboard);

  // Share
  define(nav, 'share', function (data) {
    return call('share', data || {}).then(ignore);
  });
  define(nav, 'canShare', function (data) {
    return !!data && !!(data.title || data.text || data.url);
  });

  // Notifications
  function permissionName(state) {
    return state === 'granted' ? 'granted' : state === 'notDetermined' ? 'default' : 'denied';
  }
  function HostNotification(title, options) {
    options = options || {};
    var self = this;
    this.title = String(title);
    this.body = options.body ? String(options.body) : '';
    this.icon = options.icon ? String(options.icon) : '';
    this.tag = options.tag ? String(options.tag) : '';
    this.onshow = null;
    this.onerror = null;
    call('notification.show', { title: this.title, body: this.body, icon: this.icon, tag: this.tag }).then(
      function () { if (typeof self.onshow === 'function') self.onshow(); },
      function (error) { if (typeof self.onerror === 'function') self.onerror(error); }
    );
  }
  HostNotification.prototype.close = ignore;
  HostNotification.permission = permissionName(NOTIFICATION_STATE);
  HostNotification.requestPermission = function (callback) {
    return call('notification.requestPermission', null).then(function (state) {
      var permission = permissionName(state);
      HostNotification.permission = permission;
      if (typeof callback === 'function') callback(permission);
      return permission;
    });
  };
  define(root, 'Notification', HostNotification);

  // Geolocation
  function positionOptions(options) {
    var result = {};
    if (!options) return result;
    if (typeof options.enableHighAccuracy === 'boolean') result.enableHighAccuracy = options.enableHighAccuracy;
    if (typeof options.timeout === 'number' && isFinite(options.timeout)) result.timeout = options.timeout;
    if (typeof options.maximumAge === 'number' && isFinite(options.maximumAge)) result.maximumAge = options.maximumAge;
    return result;
  }
  function positionFailure(error) {
    return toPositionError({ kind: error && error.name, message: error && error.message });
  }
  var geolocation = {
    getCurrentPosition: function (success, error, options) {
      call('geolocation.getCurrentPosition', positionOptions(options)).then(
        function (position) { if (typeof success === 'function') success(position); },
        function (e) { if (typeof error === 'function') error(positionFailure(e)); }
      );
    },
    watchPosition: function (success, error, options) {
      var localId = nextWatch++;
      watchIds[localId] = null;
      function accept(handle) {
        if (!(localId in watchIds)) {
          call('geolocation.clearWatch', { watchId: handle.watchId }).then(ignore, ignore);
          return;
        }
        watchIds[localId] = handle.watchId;
        watchers[handle.watchId] = { success: success, error: error };
      }
      call('geolocation.watchPosition', positionOptions(options), accept).then(
        ignore,
        function (e) {
          delete watchIds[localId];
          if (typeof error === 'function') error(positionFailure(e));
        }
      );
      return localId;
    },
    clearWatch: function (localId) {
      var subscriptionId = watchIds[localId];
      delete watchIds[localId];
      if (!subscriptionId) return;
      delete watchers[subscriptionId];
      call('geolocation.clearWatch', { watchId: subscriptionId }).then(ignore, ignore);
    }
  };
  define(nav, 'geolocation', geolocation);

  // Vibration
  define(nav, 'vibrate', function (pattern) {
    if (typeof pattern !== 'number' && !Array.isArray(pattern)) return false;
    call('vibrate', { pattern: pattern }).then(ignore, ignore);
    return true;
  });

  // Battery
  define(nav, 'getBattery', function () {
    return call('battery.get', null).then(function (status) {
      return {
        level: status.level,
        charging: status.charging,
        chargingTime: status.chargingTime === null ? Infinity : status.chargingTime,
        dischargingTime: status.dischargingTime === null ? Infinity : status.dischargingTime
      };
    });
  });

  // Network information
  var connection = {
    type: 'unknown',
    effectiveType: '4g',
    downlink: 10,
    rtt: 50,
    saveData: false,
    onchange: null,
    refresh: function () {
      return call('network.get', null).then(function (status) {
        connection.type = status.type;
        connection.effectiveType = status.effectiveType;
        connection.downlink = status.downlink;
        connection.rtt = status.rtt;
        connection.saveData = status.saveData;
        if (typeof connection.onchange === 'function') connection.onchange();
        return connection;
      });
    }
  };
  define(nav, 'connection', connection);
  connection.refresh().then(ignore, ignore);

  // Screen orientation
  var screen = root.screen || (root.screen = {});
  var orientation = {
    type: 'portrait-primary',
    angle: 0,
    onchange: null,
    lock: function (lockType) {
      return call('screenOrientation.lock', { orientation: lockType }).then(function () {
        return refreshOrientation().then(ignore);
      });
    },
    unlock: function () {
      call('screenOrientation.unlock', null).then(refreshOrientation).then(ignore, ignore);
    }
  };
  function refreshOrientation() {
    return call('screenOrientation.get', null).then(function (state) {
      var changed = orientation.type !== state.type || orientation.angle !== state.angle;
      orientation.type = state.type;
      orientation.angle = state.angle;
      if (changed && typeof orientation.onchange === 'function') orientation.onchange();
      return orientation;
    });
  }
  define(screen, 'orientation', orientation);
  refreshOrientation().then(ignore, ignore);

  // Console forwarding
  if (FORWARD_CONSOLE && root.console) {
    ['log', 'info', 'warn', 'error', 'debug'].forEach(function (level) {
      var original = root.console[level];
      root.console[level] = function () {
        var args = Array.prototype.slice.call(arguments);
        if (typeof original === 'function') original.apply(root.console, args);
        try {
          send({ type: 'console', loadId: LOAD_ID, level: level, args: args.map(stringify) });
        } catch (e) {
          if (typeof original === 'function') original.call(root.console, '[' + NAMESPACE + '] console forwarding failed', e);
        }
      };
    });
  }

  function stringify(value) {
    if (typeof value === 'string') return value;
    if (value instanceof Error) return value.name + ': ' + value.message;
    try {
      var json = JSON.stringify(value);
      return json === undefined ? String(value) : json;
    } catch (e) {
      return String(value);
    }
  }
})();
`;
}
