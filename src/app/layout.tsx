import type { Metadata } from "next";
import { Toaster } from "sonner";
import { BatchProvider } from "@/context/BatchContext";
import "./globals.css";

export const metadata: Metadata = {
  title: "Image Batch Studio",
  description: "Batch image transformation with Gemini",
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="en">
      <body className="antialiased">
        <BatchProvider>
          {children}
          <Toaster position="bottom-right" richColors />
        </BatchProvider>
      </body>
    </html>
  );
}
