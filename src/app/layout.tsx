export const metadata = {
  title: "Disaster Risk API",
  description: "Weather-driven disaster risk analysis and response assistant (JSON API)",
};

export default function RootLayout({ children }: { children: React.ReactNode }) {
  return (
    <html lang="en">
      <body>{children}</body>
    </html>
  );
}
