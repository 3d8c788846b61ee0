import type { ReactNode } from "react";

export const metadata = {
  title: "Sales upload analyzer",
  description: "Header detection and sales metrics for CSV and Excel exports",
};

export default function RootLayout({ children }: { children: ReactNode }) {
  return (
    <html lang="en">
      <body>{children}</body>
    </html>
  );
}
