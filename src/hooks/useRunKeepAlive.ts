"use client";

import { useEffect, useRef } from "react";

/**
 * While a run streams into the page: hold a screen wake lock so the machine
 * does not sleep mid-run, and call `onResume` when the tab becomes visible
 * again after a gap longer than `threshold`.
 */
export function useRunKeepAlive(enabled: boolean, onResume: () => void, threshold = 10000) {
  const wakeLockRef = useRef<WakeLockSentinel | null>(null);
  const hiddenAtRef = useRef<number | null>(null);
  const callbackRef = useRef(onResume);
  callbackRef.current = onResume;

  useEffect(() => {
    if (!enabled) return;
    let released = false;

    async function acquire() {
      if (!("wakeLock" in navigator) || wakeLockRef.current) return;
      try {
        wakeLockRef.current = await navigator.wakeLock.request("screen");
        wakeLockRef.current.addEventListener("release", () => {
          wakeLockRef.current = null;
        });
      } catch (error) {
        console.debug("[wake-lock] Not granted:", error);
      }
    }

    void acquire();

    const handleVisibilityChange = () => {
      if (document.visibilityState === "hidden") {
        hiddenAtRef.current = Date.now();
        return;
      }
      if (released) return;
      // The lock is dropped whenever the tab is hidden
      void acquire();
      const hiddenAt = hiddenAtRef.current;
      hiddenAtRef.current = null;
      if (hiddenAt !== null && Date.now() - hiddenAt > threshold) {
        callbackRef.current();
      }
    };

    document.addEventListener("visibilitychange", handleVisibilityChange);
    return () => {
      released = true;
      document.removeEventListener("visibilitychange", handleVisibilityChange);
      void wakeLockRef.current?.release();
      wakeLockRef.current = null;
    };
  }, [enabled, threshold]);
}
